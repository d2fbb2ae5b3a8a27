export { monotonicNow, isoNow, formatDate, formatDateZh } from './clock.js';
export { isRecord, isStringArray } from './guards.js';
export {
  LingshuError,
  BackendModelError,
  ToolNotFoundError,
  ToolArgumentsError,
  McpNotConnectedError,
  ConfigError,
  describeError,
} from './errors.js';
export { createLogger, parseLogLevel } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';
export { formatIssues } from './validation.js';
