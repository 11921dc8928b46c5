/**
 * Command-line front end
 *
 *   kitchen-layout analyze [--config <path>] [--layout <name> | --all] [--min-gap <in>]
 *   kitchen-layout render  [--config <path>] [--layout <name>] [--out <dir>]
 *                          [--scale <px/in>] [--zoom <n>] [--format svg|txt|both] [--no-archive]
 *
 * Exit status: 0 when every wall laid out cleanly, 1 when any wall has layout
 * errors, 2 for usage and configuration problems.
 */

import minimist from 'minimist';
import { KitchenPlan, PlannerOptions } from '../algorithm/types';
import { DEFAULT_OUTPUT_PREFIX, DEFAULT_SVG_SCALE } from '../algorithm/constants';
import { KitchenPlanError, planKitchen } from '../algorithm/kitchen-plan';
import { formatKitchenAnalysis } from '../algorithm/report';
import { Logger, disableLogging, enableDebugLogging } from '../algorithm/utils/logger';
import { ConfigError, KitchenConfig, loadKitchenConfig, resolveConfigPath } from '../config/kitchen-config';
import { renderKitchenSVG } from '../render/svg-renderer';
import { renderKitchenASCII } from '../render/ascii-renderer';
import { archiveOutputs, writeOutput } from '../output/output-store';

export const EXIT_OK = 0;
export const EXIT_LAYOUT_ERRORS = 1;
export const EXIT_USAGE = 2;

const OUTPUT_FORMATS = ['svg', 'txt', 'both'] as const;
type OutputFormat = typeof OUTPUT_FORMATS[number];

export const USAGE = `Usage: kitchen-layout <command> [options]

Commands:
  analyze    Print cabinet positions, gaps, errors and warnings per wall
  render     Write SVG and text diagrams of a layout

Options:
  -c, --config <path>   Kitchen configuration JSON (default: $KITCHEN_LAYOUT_CONFIG or config/kitchen_layout.json)
  -l, --layout <name>   Layout to use (default: first layout in the file)
      --all             analyze: every layout in the file
      --min-gap <in>    Smallest gap worth reporting (default: 1)
  -o, --out <dir>       render: output directory (default: output)
      --scale <px/in>   render: SVG pixels per inch (default: 3)
      --zoom <n>        render: text diagram zoom, 0.1-5 (default: 1)
      --format <f>      render: svg, txt or both (default: both)
      --prefix <name>   render: output file name prefix (default: kitchen_layout)
      --no-archive      render: do not archive previous outputs
  -v, --verbose         Debug logging on stderr
  -q, --quiet           No logging on stderr (reports and errors still print)
  -h, --help            Show this help`;

/**
 * Error thrown for bad command-line input
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Where command output goes. Defaults to the console.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const consoleIO: CliIO = {
  stdout: text => console.log(text),
  stderr: text => console.error(text)
};

interface ParsedArgs {
  command?: string;
  configPath: string;
  layout?: string;
  all: boolean;
  minGapToReport?: number;
  outDir: string;
  scale: number;
  zoom: number;
  format: OutputFormat;
  prefix: string;
  archive: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
}

function parseNumber(flag: string, value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new UsageError(`--${flag} must be a number, got '${String(value)}'`);
  }
  return parsed;
}

function parseString(flag: string, value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new UsageError(`--${flag} needs a value`);
  }
  return value;
}

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  const argv = minimist(args, {
    string: ['config', 'layout', 'out', 'scale', 'zoom', 'format', 'min-gap', 'prefix'],
    boolean: ['all', 'archive', 'verbose', 'quiet', 'help'],
    alias: { c: 'config', l: 'layout', o: 'out', v: 'verbose', q: 'quiet', h: 'help' },
    default: { archive: true }
  });

  if (argv.verbose === true && argv.quiet === true) {
    throw new UsageError('--verbose and --quiet cannot be combined');
  }

  const format = parseString('format', argv.format) ?? 'both';
  if (!isOutputFormat(format)) {
    throw new UsageError(`--format must be one of ${OUTPUT_FORMATS.join(', ')}, got '${format}'`);
  }

  const minGapToReport = parseNumber('min-gap', argv['min-gap']);
  if (minGapToReport !== undefined && minGapToReport < 0) {
    throw new UsageError('--min-gap must be zero or more');
  }

  const scale = parseNumber('scale', argv.scale) ?? DEFAULT_SVG_SCALE;
  if (scale <= 0) {
    throw new UsageError('--scale must be positive');
  }

  return {
    command: argv._.length > 0 ? String(argv._[0]) : undefined,
    configPath: resolveConfigPath(parseString('config', argv.config), env),
    layout: parseString('layout', argv.layout),
    all: argv.all === true,
    minGapToReport,
    outDir: parseString('out', argv.out) ?? 'output',
    scale,
    zoom: parseNumber('zoom', argv.zoom) ?? 1,
    format,
    prefix: parseString('prefix', argv.prefix) ?? DEFAULT_OUTPUT_PREFIX,
    archive: argv.archive !== false,
    verbose: argv.verbose === true,
    quiet: argv.quiet === true,
    help: argv.help === true
  };
}

function defaultLayoutName(config: KitchenConfig): string {
  const [first] = Object.keys(config.layouts);
  if (first === undefined) {
    throw new ConfigError('No layouts defined in configuration');
  }
  return first;
}

async function runAnalyze(args: ParsedArgs, io: CliIO): Promise<number> {
  const config = await loadKitchenConfig(args.configPath);
  const names = args.all ? Object.keys(config.layouts) : [args.layout ?? defaultLayoutName(config)];
  const options: PlannerOptions = { minGapToReport: args.minGapToReport };

  const plans: KitchenPlan[] = names.map(name => planKitchen(config, name, options));
  io.stdout(plans.map(plan => formatKitchenAnalysis(plan)).join('\n\n\n'));

  return plans.every(plan => plan.success) ? EXIT_OK : EXIT_LAYOUT_ERRORS;
}

async function runRender(args: ParsedArgs, io: CliIO): Promise<number> {
  if (args.all) {
    throw new UsageError('render works on one layout at a time; use --layout');
  }

  const config = await loadKitchenConfig(args.configPath);
  const plan = planKitchen(config, args.layout ?? defaultLayoutName(config), {
    minGapToReport: args.minGapToReport
  });

  if (args.archive) {
    await archiveOutputs(args.outDir, { prefix: args.prefix });
  }

  const written: string[] = [];
  if (args.format !== 'txt') {
    const svg = renderKitchenSVG(plan, { scale: args.scale });
    written.push(await writeOutput(args.outDir, `${args.prefix}.svg`, svg));
  }
  if (args.format !== 'svg') {
    const text = renderKitchenASCII(plan, { zoom: args.zoom });
    written.push(await writeOutput(args.outDir, `${args.prefix}.txt`, text));
  }

  written.forEach(path => io.stdout(`Wrote ${path}`));
  if (!plan.success) {
    const errorCount = plan.walls.reduce((sum, w) => sum + w.result.errors.length, 0);
    io.stderr(`Layout '${plan.layoutName}' has ${errorCount} error(s); run 'analyze' for details`);
    return EXIT_LAYOUT_ERRORS;
  }
  return EXIT_OK;
}

/**
 * Run the CLI and return its exit status.
 * Usage and configuration problems are reported on stderr; anything else propagates.
 */
export async function runCli(
  args: string[],
  io: CliIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const parsed = parseArgs(args, env);
    if (parsed.verbose) {
      enableDebugLogging();
    } else if (parsed.quiet) {
      disableLogging();
    }

    if (parsed.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    switch (parsed.command) {
      case 'analyze':
        return await runAnalyze(parsed, io);
      case 'render':
        return await runRender(parsed, io);
      case undefined:
        throw new UsageError('No command given');
      default:
        throw new UsageError(`Unknown command '${parsed.command}'`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      Logger.debug('Configuration error', error.issues);
      io.stderr(error.message);
      return EXIT_USAGE;
    }
    if (error instanceof KitchenPlanError) {
      io.stderr(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
}
