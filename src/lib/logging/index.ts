/**
 * Logging Module
 *
 * Provides:
 * - pino logger feeding extended data
 * - Verbosity to level mapping
 */

export {
  createExtdataLogger,
  createSinkDestination,
  verbosityToLevel,
  type ExtdataLoggerOptions,
  type LogRecord,
} from './extdataLogger.js';
