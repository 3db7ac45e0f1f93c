export {
  StructuredLogger,
  ComponentLogger,
  LogTimer,
  type LogContext,
  type LogEntry,
  LogLevel
} from './structured-logger';

export {
  type LoggerConfig,
  getLogLevel,
  getLoggerConfig,
  shouldLog,
  LOG_LEVEL_NAMES,
  PRODUCTION_CONFIG
} from './logger-config';

export {
  sanitizeLogData,
  sanitizeMessage,
  sanitizeString,
  sanitizeObject,
  type SanitizeOptions
} from './log-sanitizer';

import { StructuredLogger, type LogContext } from './structured-logger';

export const createLogger = (component: string, baseContext?: LogContext) =>
  StructuredLogger.create(component, baseContext);
