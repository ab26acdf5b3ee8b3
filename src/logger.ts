import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ORDER: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const NAMESPACE = 'podtail';

// One debug instance per level; `success` shares the info threshold
const channels = {
  trace: debug(`${NAMESPACE}:trace`),
  debug: debug(`${NAMESPACE}:debug`),
  info: debug(`${NAMESPACE}:info`),
  warn: debug(`${NAMESPACE}:warn`),
  error: debug(`${NAMESPACE}:error`),
  success: debug(`${NAMESPACE}:success`),
};

// Diagnostics go to stderr so stdout carries only forwarded log lines
debug.log = (...args: unknown[]) => console.error(...args);

/**
 * Type guard for user-supplied log level strings
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
    this.updateDebugNamespaces();
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.updateDebugNamespaces();
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private updateDebugNamespaces(): void {
    const threshold = LOG_LEVELS[this.level];
    const namespaces = LEVEL_ORDER
      .filter(level => LOG_LEVELS[level] >= threshold)
      .map(level => `${NAMESPACE}:${level}`);

    if (threshold <= LOG_LEVELS.info) {
      namespaces.push(`${NAMESPACE}:success`);
    }

    debug.enable(namespaces.join(','));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      channels.trace(chalk.dim(`[TRACE] ${message}`), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      channels.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      channels.info(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      channels.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      channels.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      channels.success(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
