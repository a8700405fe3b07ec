/**
 * @coinlens/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error classes
 * - Formatting helpers
 */

export { Logger, winstonLogger, createLogger } from './logger';
export type { LogContext } from './logger';

export * from './config';

export * from './errors';

export {
  capitalize,
  titleCase,
  replaceUnderscores,
  prettifyColumnName,
  stripTags,
  formatLargeNumber,
} from './format';
