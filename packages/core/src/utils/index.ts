/**
 * Logging utilities
 */

export { serializeForLog, sanitizeHeadersForLog, errorToLog } from './logging.js';
export type { LoggingOptions } from './logging-helpers.js';
export {
  DEFAULT_LOGGING_OPTIONS,
  getLoggingOptions,
  truncateForLogging,
  summarizeValue,
  valueForLog,
} from './logging-helpers.js';
