/**
 * @module @inflammation/core
 * @description Shared core utilities for the inflammation study
 *
 * Exports:
 * - Logger with patient/doctor name redaction
 * - Error classes
 * - Environment validation
 * - CSV table loader
 */

export {
  createLogger,
  NAME_REDACTION_PATHS,
  type CreateLoggerOptions,
  type Logger,
} from './logger.js';

export {
  AppError,
  ValidationError,
  DataSourceError,
  InvalidTableTypeError,
  TableShapeError,
  NegativeValueError,
  IndexOutOfRangeError,
  isOperationalError,
  isInflammationError,
  toSafeErrorResponse,
  type InflammationError,
  type SafeErrorDetails,
} from './errors.js';

export { StudyEnvSchema, validateEnv, getEnv, type StudyEnv } from './env.js';

export {
  parseInflammationCSV,
  loadInflammationCSV,
  resolveDataPath,
  type LoadCSVOptions,
} from './csv-loader.js';
