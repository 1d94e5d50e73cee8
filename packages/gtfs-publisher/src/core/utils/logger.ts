/**
 * Structured logging for the GTFS publisher
 *
 * Levels, timestamps and contextual metadata on top of the console.
 * JSON lines in production, single readable lines otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get service(): string {
    return this.config.service;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

const isPretty = (): boolean => process.env.NODE_ENV !== 'production';

/**
 * Create a logger scoped to a module
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger({
    level: getLogLevel(),
    service: `gtfs-publisher:${context.module}`,
    pretty: isPretty(),
  });
}
