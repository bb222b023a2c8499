import type { Logger, LogLevel } from '../types/logger.js';
import { LOG_LEVELS } from '../types/logger.js';
import { createColors, detectColorSupport, type Colors } from './colors.js';

export interface TerminalLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Line sink (default: console.error, so log lines stay off the rendered screen) */
  write?: (line: string) => void;
}

/**
 * `DEBUG=thermoline` (or `*`) turns on debug output
 */
export function detectLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const debug = env.DEBUG || '';
  if (debug.includes('thermoline') || debug.includes('*')) {
    return 'debug';
  }
  return 'none';
}

/**
 * Default line-oriented logger with prefix, optional clock and colors
 */
export class TerminalLogger implements Logger {
  private level: LogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private c: Colors;
  private write: (line: string) => void;

  constructor(options: TerminalLoggerOptions = {}) {
    this.level = options.level || detectLogLevel();
    this.prefix = options.prefix || 'thermoline';
    this.useTimestamp = options.timestamp !== false;
    this.c = createColors(options.colors !== false && detectColorSupport());
    this.write = options.write || ((line) => console.error(line));
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.c.gray(`[${time}]`) + ' ';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(msgOrObj: string | object, args: unknown[]): string {
    const parts = [typeof msgOrObj === 'string' ? msgOrObj : JSON.stringify(msgOrObj)];
    for (const arg of args) {
      parts.push(typeof arg === 'string' ? arg : JSON.stringify(arg));
    }
    return parts.join(' ');
  }

  private log(level: Exclude<LogLevel, 'none'>, message: string) {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = this.c.cyan(`[${this.prefix}]`);
    this.write(`${timestamp}${prefix} ${message}`);
  }

  debug(msgOrObj: string | object, ...args: unknown[]) {
    this.log('debug', this.format(msgOrObj, args));
  }

  info(msgOrObj: string | object, ...args: unknown[]) {
    this.log('info', this.format(msgOrObj, args));
  }

  warn(msgOrObj: string | object, ...args: unknown[]) {
    this.log('warn', this.c.yellow(this.format(msgOrObj, args)));
  }

  error(msgOrObj: string | object, ...args: unknown[]) {
    this.log('error', this.c.red(this.format(msgOrObj, args)));
  }
}

export function createLogger(options: TerminalLoggerOptions = {}): TerminalLogger {
  return new TerminalLogger(options);
}
