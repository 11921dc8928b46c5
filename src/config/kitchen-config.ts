/**
 * Kitchen Configuration
 *
 * Loads the persisted kitchen description: wall segment lengths and, per named
 * layout, the ordered base and wall cabinet runs for each wall.
 *
 * The file is JSON. Its shape is validated here so the engine can trust that
 * widths and positions are numbers whenever they are present.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  CabinetSpec,
  KitchenConfig,
  KitchenLayoutDefinition,
  WallDefinition
} from '../algorithm/types';
import { DEFAULT_CABINET_KIND, GAP_KIND } from '../algorithm/constants';
import { Logger } from '../algorithm/utils/logger';

export const DEFAULT_CONFIG_PATH = 'config/kitchen_layout.json';
export const CONFIG_PATH_ENV = 'KITCHEN_LAYOUT_CONFIG';

/**
 * Error thrown when the configuration cannot be read or fails validation.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// SCHEMA (file format)
// ============================================================================

export const CabinetEntrySchema = z
  .object({
    type: z.string().min(1).optional(),
    width: z.number().finite().optional(),
    position: z.number().finite().optional()
  })
  .passthrough();

export type CabinetEntry = z.infer<typeof CabinetEntrySchema>;

// A wall is either a bare length or an object carrying one
const WallEntrySchema = z.union([
  z.number().positive(),
  z
    .object({
      length: z.number().positive(),
      type: z.string().optional()
    })
    .passthrough()
]);

// Wall name -> ordered run; null means "no cabinets on this wall"
const CabinetRunsSchema = z
  .record(z.string(), z.array(CabinetEntrySchema).nullable())
  .default({});

const LayoutEntrySchema = z
  .object({
    description: z.string().optional(),
    base_cabinets: CabinetRunsSchema,
    wall_cabinets: CabinetRunsSchema
  })
  .passthrough();

export const KitchenConfigFileSchema = z.object({
  walls: z.record(z.string(), WallEntrySchema),
  layouts: z.record(z.string(), LayoutEntrySchema)
});

export type KitchenConfigFile = z.infer<typeof KitchenConfigFileSchema>;

export type { WallDefinition, KitchenLayoutDefinition, KitchenConfig };

/**
 * Convert a file entry to a cabinet spec.
 * `type` becomes the kind, `position` the explicit position; every other field is kept as extras.
 */
export function toCabinetSpec(entry: CabinetEntry): CabinetSpec {
  const { type, width, position, ...extras } = entry;
  const kind = type ?? DEFAULT_CABINET_KIND;

  if (kind === GAP_KIND) {
    return { kind: GAP_KIND, width, extras };
  }
  return { kind, width, explicitPosition: position, extras };
}

// Own keys only: a wall named "__proto__" stays a plain key
function toRuns(runs: Record<string, CabinetEntry[] | null>): Record<string, CabinetSpec[]> {
  return Object.fromEntries(
    Object.entries(runs).map(([wallName, entries]) => [wallName, (entries ?? []).map(toCabinetSpec)])
  );
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate and normalize a parsed configuration document.
 *
 * @throws {ConfigError} If the document does not match the schema, or a
 *         layout places cabinets on a wall that is not defined
 */
export function parseKitchenConfig(raw: unknown): KitchenConfig {
  const parsed = KitchenConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid kitchen configuration', formatIssues(parsed.error));
  }

  const walls: Record<string, WallDefinition> = Object.fromEntries(
    Object.entries(parsed.data.walls).map(([name, entry]): [string, WallDefinition] => [
      name,
      typeof entry === 'number' ? { name, length: entry } : { name, length: entry.length, type: entry.type }
    ])
  );

  const issues: string[] = [];
  const layouts: [string, KitchenLayoutDefinition][] = [];

  for (const [name, entry] of Object.entries(parsed.data.layouts)) {
    const tiers = [
      ['base_cabinets', entry.base_cabinets],
      ['wall_cabinets', entry.wall_cabinets]
    ] as const;
    for (const [tierKey, runs] of tiers) {
      for (const wallName of Object.keys(runs)) {
        if (!Object.hasOwn(walls, wallName)) {
          issues.push(`layouts.${name}.${tierKey}.${wallName}: unknown wall "${wallName}"`);
        }
      }
    }

    layouts.push([name, {
      name,
      description: entry.description,
      baseCabinets: toRuns(entry.base_cabinets),
      wallCabinets: toRuns(entry.wall_cabinets)
    }]);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid kitchen configuration', issues);
  }

  return { walls, layouts: Object.fromEntries(layouts) };
}

// Errors raised by fs may come from another realm, so check shape rather than class
function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Read, parse and validate a kitchen configuration file.
 *
 * @throws {ConfigError} If the file is missing, is not JSON, or is invalid
 */
export async function loadKitchenConfig(path: string): Promise<KitchenConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  const config = parseKitchenConfig(raw);
  Logger.info(
    `Loaded ${path}: ${Object.keys(config.walls).length} walls, ` +
      `${Object.keys(config.layouts).length} layouts`
  );
  return config;
}

/**
 * Config path from the --config flag, else the environment, else the default.
 */
export function resolveConfigPath(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return flag ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
}
