import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  success: 'SUCCESS',
  warn: 'WARNING',
  error: 'ERROR'
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red
};

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

export interface LoggerOptions {
  /** Plain-text log file; created with its directory on first write */
  filePath?: string;
  verbose?: boolean;
  /** Console output; defaults to stdout, with errors on stderr */
  console?: LogSink;
  clock?: () => Date;
}

const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
};

export class Logger {
  readonly filePath?: string;
  private readonly verbose: boolean;
  private readonly console: LogSink;
  private readonly clock: () => Date;
  private fileReady = false;

  constructor(options: LoggerOptions = {}) {
    this.filePath = options.filePath;
    this.verbose = options.verbose ?? false;
    this.console = options.console ?? consoleSink;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(message: string): void {
    if (this.verbose) {
      this.log('debug', message);
    }
  }

  info(message: string): void {
    this.log('info', message);
  }

  success(message: string): void {
    this.log('success', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    const timestamp = formatTimestamp(this.clock());
    this.console.write(level, `[${timestamp}] ${LEVEL_COLOR[level](LEVEL_LABEL[level])}: ${message}`);
    this.appendToFile(`[${timestamp}] ${LEVEL_LABEL[level]}: ${message}\n`);
  }

  private appendToFile(line: string): void {
    if (!this.filePath) {
      return;
    }
    if (!this.fileReady) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.fileReady = true;
    }
    // Synchronous so the file is complete even when the process exits right after
    appendFileSync(this.filePath, line);
  }
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `YYYY-MM-DD HH:mm:ss` in local time */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `<directory>/deployment-YYYYMMDD_HHMMSS.log` */
export function logFilePath(directory: string, date: Date = new Date()): string {
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return join(directory, `deployment-${stamp}.log`);
}
