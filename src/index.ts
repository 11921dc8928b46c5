/**
 * Kitchen Layout
 *
 * Main entry point for the library
 */

// Export geometry types
export * from './types';

// Export geometry utilities
export * from './geometry';

// Export engine, planner and reports
export * from './algorithm';

// Export configuration loading
export {
  ConfigError,
  loadKitchenConfig,
  parseKitchenConfig,
  resolveConfigPath,
  toCabinetSpec,
  DEFAULT_CONFIG_PATH
} from './config/kitchen-config';

// Export renderers
export { renderWallSVG, renderKitchenSVG, renderEmptyKitchen } from './render/svg-renderer';
export type { SvgRenderOptions } from './render/svg-renderer';
export { renderWallASCII, renderKitchenASCII } from './render/ascii-renderer';
export type { AsciiRenderOptions } from './render/ascii-renderer';

// Export output archiving
export { archiveOutputs, writeOutput } from './output/output-store';

// Export logger utility
export { Logger, LogLevel } from './algorithm/utils/logger';

// Version info
export const VERSION = '0.3.0';
export const NAME = 'Kitchen Layout';
