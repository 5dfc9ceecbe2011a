import { logSanitizer, SanitizationPresets, SanitizationOptions, SanitizedError } from '../security/logSanitizer';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const LOG_FORMATS = ['json', 'text'] as const;
export const ENVIRONMENTS = ['development', 'test', 'production'] as const;

export type LogLevel = typeof LOG_LEVELS[number];
export type LogFormat = typeof LOG_FORMATS[number];
export type Environment = typeof ENVIRONMENTS[number];
export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  service: string;
  level: LogLevel;
  format: LogFormat;
  environment: Environment;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
}

interface LogEntry {
  timestamp: string;
  level: string;
  service: string;
  message: string;
  error?: SanitizedError;
  meta?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = LOG_LEVELS;

class ConsoleLogger implements Logger {
  private readonly sanitization: SanitizationOptions;

  constructor(private readonly options: LoggerOptions) {
    this.sanitization = SanitizationPresets[options.environment];
  }

  private formatLog(level: LogLevel, message: string, error?: Error, meta?: LogMeta): string {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      service: this.options.service,
      message: logSanitizer.sanitizeString(message, this.sanitization)
    };

    if (error) {
      entry.error = logSanitizer.sanitizeError(error, this.sanitization);
    }

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = logSanitizer.sanitizeObject(meta, this.sanitization);
    }

    if (this.options.format === 'json') {
      return JSON.stringify(entry);
    }

    const metaStr = entry.meta ? ` | ${JSON.stringify(entry.meta)}` : '';
    const errorStr = entry.error ? ` | ${entry.error.name}: ${entry.error.message}` : '';
    const stackStr = entry.error?.stack ? `\n${entry.error.stack}` : '';
    return `[${entry.timestamp}] ${entry.level} ${entry.service}: ${entry.message}${metaStr}${errorStr}${stackStr}`;
  }

  private shouldLog(level: LogLevel): boolean {
    // In production, only log info and above
    if (this.options.environment === 'production' && level === 'debug') {
      return false;
    }

    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.options.level);
  }

  private log(level: LogLevel, message: string, error?: Error, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formattedLog = this.formatLog(level, message, error, meta);

    switch (level) {
      case 'error':
        console.error(formattedLog);
        break;
      case 'warn':
        console.warn(formattedLog);
        break;
      case 'info':
        console.info(formattedLog);
        break;
      case 'debug':
        console.debug(formattedLog);
        break;
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, undefined, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, undefined, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, undefined, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    this.log('error', message, error, meta);
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
