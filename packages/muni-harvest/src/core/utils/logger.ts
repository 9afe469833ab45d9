/**
 * Structured logging for muni-harvest
 *
 * One line per event: human-readable during development, a JSON object when
 * NODE_ENV=production. Module loggers stamp their module onto every line.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export type LogFormat = 'pretty' | 'json';

/** Receives finished lines; defaults to the console method of the level */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly service: string;
  readonly format: LogFormat;
  /** Bound to every line, e.g. `{ module: 'page-parser' }` */
  readonly context?: LogMetadata;
  readonly sink?: LogSink;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

export class Logger {
  private readonly options: LoggerOptions;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.options = options;
    this.sink = options.sink ?? consoleSink;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.options.level];
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.sink(level, this.format(level, message, { ...this.options.context, ...metadata }));
  }

  private format(level: LogLevel, message: string, fields: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const { service } = this.options;

    if (this.options.format === 'json') {
      return JSON.stringify({ timestamp, level, service, message, ...fields });
    }

    const { module, ...rest } = fields;
    const origin = typeof module === 'string' ? `${service}:${module}` : service;
    const details = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    return `[${timestamp}] ${level.toUpperCase()} ${origin}: ${message}${details}`;
  }
}

function parseLogLevel(value: string | undefined): LogLevel | null {
  const level = value?.trim().toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return null;
}

function defaultOptions(): LoggerOptions {
  return {
    level: parseLogLevel(process.env.LOG_LEVEL) ?? 'info',
    service: 'muni-harvest',
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  };
}

export const logger = new Logger(defaultOptions());

/**
 * Module-scoped logger, e.g. `createLogger({ module: 'page-parser' })`.
 * LOG_LEVEL is read when the logger is created.
 */
export function createLogger(context: { readonly module: string; readonly level?: LogLevel }): Logger {
  const options = defaultOptions();
  return new Logger({
    ...options,
    level: context.level ?? options.level,
    context: { module: context.module },
  });
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
