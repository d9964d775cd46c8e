/**
 * Utility exports
 * @module utils
 */

// Math utilities
export { lerp, round, mean, sampleVariance, sampleStandardDeviation } from './math';

// Validation utilities
export {
  ValidationError,
  validateWaveform,
  validateInteger,
  validateFinite,
} from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  configureFromEnvironment,
  formatLogEntry,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  defaultLogger,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
