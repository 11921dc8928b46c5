/**
 * Kitchen Layout - Logging Utility
 *
 * Levelled logging for the engine and the CLI.
 * Everything goes to stderr so that reports and rendered diagrams on stdout
 * stay clean when piped to a file.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

const TAGS: Record<Exclude<LogLevel, LogLevel.NONE>, string> = {
  [LogLevel.DEBUG]: '[DEBUG]',
  [LogLevel.INFO]: '[INFO]',
  [LogLevel.WARN]: '[WARN]',
  [LogLevel.ERROR]: '[ERROR]'
};

let currentLevel: LogLevel = LogLevel.WARN;

function write(level: Exclude<LogLevel, LogLevel.NONE>, msg: string, args: unknown[]): void {
  if (currentLevel <= level) {
    console.error(`${TAGS[level]} ${msg}`, ...args);
  }
}

/**
 * Default level is WARN. `--verbose` switches to DEBUG, `--quiet` to NONE.
 */
export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  /**
   * Placement tracing: each placed cabinet, per-wall summaries
   */
  debug: (msg: string, ...args: unknown[]): void => write(LogLevel.DEBUG, msg, args),

  /**
   * Major steps: config loaded, files written, versions archived
   */
  info: (msg: string, ...args: unknown[]): void => write(LogLevel.INFO, msg, args),

  warn: (msg: string, ...args: unknown[]): void => write(LogLevel.WARN, msg, args),

  error: (msg: string, ...args: unknown[]): void => write(LogLevel.ERROR, msg, args)
};

export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
