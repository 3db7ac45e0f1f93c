/**
 * Log level management and environment-based configuration.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LoggerConfig {
  level: LogLevel;
  sanitize: boolean;
  maxSize: number;
  sampleRate: number;
  enableTimestamp: boolean;
  enableContext: boolean;
}

/**
 * Get the current log level based on environment variables
 */
export const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toUpperCase();
  switch (level) {
    case 'ERROR': return LogLevel.ERROR;
    case 'WARN': return LogLevel.WARN;
    case 'INFO': return LogLevel.INFO;
    case 'DEBUG': return LogLevel.DEBUG;
    default:
      // Production default: WARN, Development default: INFO
      return process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO;
  }
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) ? parsed : fallback;
};

export const getLoggerConfig = (): LoggerConfig => {
  return {
    level: getLogLevel(),
    sanitize: process.env.LOG_SANITIZE !== 'false',
    maxSize: parseNumber(process.env.LOG_MAX_SIZE, 2000),
    sampleRate: parseNumber(process.env.LOG_SAMPLE_RATE, 1.0),
    enableTimestamp: process.env.LOG_TIMESTAMP !== 'false',
    enableContext: process.env.LOG_CONTEXT !== 'false'
  };
};

/**
 * Check if a log level should be emitted
 */
export const shouldLog = (level: LogLevel, config?: LoggerConfig): boolean => {
  const logConfig = config || getLoggerConfig();

  // Lower numeric values are more severe
  if (level > logConfig.level) {
    return false;
  }

  // Errors are never sampled away
  if (level !== LogLevel.ERROR && logConfig.sampleRate < 1.0 && Math.random() > logConfig.sampleRate) {
    return false;
  }

  return true;
};

export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG'
};

export const PRODUCTION_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  sanitize: true,
  maxSize: 2000,
  sampleRate: 1.0,
  enableTimestamp: true,
  enableContext: true
};
