/**
 * Structured logging for toolrelay packages
 *
 * Provides:
 * - Level filtering driven by LOG_LEVEL
 * - Sanitization of credentials in messages and context
 * - Human-readable output in development, JSON lines elsewhere
 * - Component-scoped loggers and operation timers
 * - Log suppression under NODE_ENV=test unless TOOLRELAY_TEST_LOGS is set
 */

import { LogLevel, LoggerConfig, getLoggerConfig, shouldLog, LOG_LEVEL_NAMES } from './logger-config';
import { sanitizeLogData, sanitizeMessage } from './log-sanitizer';

export { LogLevel };

export interface LogContext {
  component?: string;
  serverName?: string;
  requestId?: string | number;
  taskId?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

type Environment = 'development' | 'production' | 'test';

const currentEnvironment = (): Environment => {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
};

export class StructuredLogger {
  private static instance: StructuredLogger | undefined;
  private readonly fixedConfig: LoggerConfig | undefined;

  // ANSI color codes for console output
  private static readonly COLORS: Record<string, string> = {
    ERROR: '\x1b[31m',
    WARN: '\x1b[33m',
    INFO: '\x1b[32m',
    DEBUG: '\x1b[36m'
  };

  private static readonly RESET_COLOR = '\x1b[0m';

  constructor(config?: LoggerConfig) {
    this.fixedConfig = config;
  }

  static getInstance(): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger();
    }
    return StructuredLogger.instance;
  }

  /**
   * Create a logger with specific component context
   */
  static create(component: string, baseContext?: LogContext): ComponentLogger {
    return new ComponentLogger(component, baseContext);
  }

  private get config(): LoggerConfig {
    return this.fixedConfig ?? getLoggerConfig();
  }

  log(level: LogLevel, message: string, context: LogContext = {}): void {
    const environment = currentEnvironment();
    if (environment === 'test' && !process.env.TOOLRELAY_TEST_LOGS) {
      return;
    }

    const config = this.config;
    if (!shouldLog(level, config)) {
      return;
    }

    const { error, ...rest } = context;
    const sanitizedMessage = config.sanitize ? sanitizeMessage(message) : message;
    const sanitizedContext: Record<string, unknown> = config.sanitize ? sanitizeLogData(rest) : rest;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      message: sanitizedMessage,
      context: config.enableContext ? sanitizedContext : { component: rest.component }
    };

    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: config.sanitize ? sanitizeMessage(error.message) : error.message,
        stack: error.stack
      };
    } else if (error !== undefined) {
      entry.context = { ...entry.context, error: config.sanitize ? sanitizeLogData({ error }).error : error };
    }

    this.outputToConsole(entry, environment, config);
  }

  private outputToConsole(entry: LogEntry, environment: Environment, config: LoggerConfig): void {
    const levelName = entry.level;
    const logString = JSON.stringify(entry);

    if (logString.length > config.maxSize) {
      const truncated = {
        ...entry,
        message: entry.message.substring(0, Math.floor(config.maxSize / 2)),
        context: { component: entry.context.component, _truncated: true, _originalSize: logString.length }
      };
      console.error(JSON.stringify(truncated));
      return;
    }

    if (environment === 'development') {
      const color = StructuredLogger.COLORS[levelName];
      const timestamp = config.enableTimestamp ? `${entry.timestamp.substring(11, 23)} ` : '';
      const { component, ...fields } = entry.context;
      const componentTag = typeof component === 'string' ? `[${component}]` : '';
      const contextStr = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
      const errorStr = entry.error ? `\n${entry.error.stack || entry.error.message}` : '';

      console.log(
        `${color}${timestamp}[${levelName}]${StructuredLogger.RESET_COLOR} ${componentTag} ${entry.message}${contextStr}${errorStr}`
      );
      return;
    }

    switch (entry.level) {
      case 'ERROR':
        console.error(logString);
        break;
      case 'WARN':
        console.warn(logString);
        break;
      default:
        console.log(logString);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context || {});
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context || {});
  }

  warn(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.WARN, message, { ...(context || {}), ...(error !== undefined && { error }) });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, { ...(context || {}), ...(error !== undefined && { error }) });
  }

  timer(operation: string, baseContext?: LogContext): LogTimer {
    return new LogTimer(operation, baseContext || {}, this);
  }
}

/**
 * Component-specific logger that automatically includes component context
 */
export class ComponentLogger {
  private logger: StructuredLogger;
  private baseContext: LogContext;

  constructor(component: string, baseContext: LogContext = {}, logger?: StructuredLogger) {
    this.logger = logger ?? StructuredLogger.getInstance();
    this.baseContext = { component, ...baseContext };
  }

  /**
   * Create a new logger with additional context
   */
  withContext(additionalContext: LogContext): ComponentLogger {
    return new ComponentLogger(
      this.baseContext.component || 'unknown',
      { ...this.baseContext, ...additionalContext },
      this.logger
    );
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context: LogContext = {}): void {
    this.logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, error?: unknown, context: LogContext = {}): void {
    this.logger.warn(message, error, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context: LogContext = {}): void {
    this.logger.error(message, error, { ...this.baseContext, ...context });
  }

  timer(operation: string, additionalContext?: LogContext): LogTimer {
    return new LogTimer(operation, { ...this.baseContext, ...additionalContext }, this.logger);
  }
}

/**
 * Performance timer for operation measurement
 */
export class LogTimer {
  private readonly startTime: number;

  constructor(
    private readonly operation: string,
    private readonly context: LogContext = {},
    private readonly logger: StructuredLogger = StructuredLogger.getInstance()
  ) {
    this.startTime = performance.now();
  }

  elapsed(): number {
    return Math.round(performance.now() - this.startTime);
  }

  /**
   * Stop the timer and log the duration
   */
  stop(level: LogLevel = LogLevel.DEBUG, additionalContext: LogContext = {}): number {
    const duration = this.elapsed();

    this.logger.log(level, `Operation completed: ${this.operation}`, {
      ...this.context,
      ...additionalContext,
      operation: this.operation,
      duration
    });

    return duration;
  }

  stopWithError(error: unknown, additionalContext: LogContext = {}): number {
    return this.stop(LogLevel.ERROR, { ...additionalContext, error });
  }

  stopWithWarning(additionalContext: LogContext = {}): number {
    return this.stop(LogLevel.WARN, additionalContext);
  }
}
