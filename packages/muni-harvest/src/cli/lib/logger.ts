/**
 * CLI output for muni-harvest
 *
 * Human-readable colored lines on a terminal, one JSON object per line with
 * --json. Tracks command duration and draws the extraction progress bar.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata } from '../../core/utils/logger.js';

export interface CLILoggerConfig {
  readonly level: LogLevel;
  readonly json: boolean;
  /** Progress bar / log stream; defaults to process.stderr */
  readonly stream?: NodeJS.WritableStream;
}

export interface ProgressOptions {
  readonly total: number;
  readonly current: number;
  readonly label?: string;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const PROGRESS_BAR_WIDTH = 30;

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private readonly stream: NodeJS.WritableStream;
  private startTime = Date.now();
  private command: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = config;
    this.stream = config.stream ?? process.stderr;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const durationMs = Date.now() - this.startTime;
    if (success) {
      this.info('Command completed', { duration: formatDuration(durationMs), ...metadata });
    } else {
      this.error('Command failed', { duration: formatDuration(durationMs), ...metadata });
    }
  }

  /**
   * Progress bar on a terminal; a debug entry per step in JSON mode
   */
  progress({ total, current, label }: ProgressOptions): void {
    const percent = total > 0 ? Math.round((current / total) * 100) : 100;

    if (this.config.json) {
      this.debug('Progress', { current, total, percent, label });
      return;
    }

    const filled = total > 0 ? Math.round((current / total) * PROGRESS_BAR_WIDTH) : PROGRESS_BAR_WIDTH;
    const bar = `[${'='.repeat(filled)}${' '.repeat(PROGRESS_BAR_WIDTH - filled)}]`;
    const labelStr = label ? ` ${label}` : '';

    this.stream.write(
      `\r${COLORS.dim}${bar}${COLORS.reset} ${percent}% (${current}/${total})${labelStr}\x1b[K`
    );
    if (current >= total) {
      this.stream.write('\n');
    }
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.level]) {
      return;
    }
    const line = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
    this.stream.write(`${line}\n`);
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.command ? { command: this.command } : {}),
      ...metadata,
    });
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${COLORS.reset} ${message}`;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    stream: config.stream,
  });
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
