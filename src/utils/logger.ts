/**
 * Leveled console logger shared by the library, the CLI and the dev server
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LoggerOptions {
  debug?: boolean;
  /** Suppress all output (tests) */
  silent?: boolean;
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray('[debug]'),
  info: chalk.cyan('[info]'),
  warn: chalk.yellow('[warn]'),
  error: chalk.red('[error]'),
};

class ConsoleLogger implements Logger {
  constructor(private options: LoggerOptions) {}

  configure(options: LoggerOptions): void {
    this.options = { ...options };
  }

  debug(message: string, meta?: unknown): void {
    if (this.options.debug) {
      this.write('debug', message, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.options.silent) return;

    const timestamp = chalk.dim(new Date().toISOString());
    let line = `${timestamp} ${LEVEL_TAGS[level]} ${message}`;
    if (meta !== undefined) {
      line += ' ' + chalk.dim(formatMeta(meta));
    }

    // stdout stays free for CLI results
    console.error(line);
  }
}

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return meta.message;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

// Single instance: modules may hold on to it from load time
const instance = new ConsoleLogger({ debug: false });

/**
 * Reconfigure the process-wide logger
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  instance.configure(options);
  return instance;
}

export function getLogger(): Logger {
  return instance;
}
