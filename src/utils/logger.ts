/**
 * Leveled console logging with an optional plain-text file sink.
 */
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Simple structured logger for the tidy CLI.
 */
class Logger {
  private level: LogLevel = 'info';
  private logFile: string | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Mirror every message, regardless of console level, into a file.
   * Pass null to stop writing.
   */
  setLogFile(filePath: string | null): void {
    if (filePath) {
      mkdirSync(dirname(filePath), { recursive: true });
    }
    this.logFile = filePath;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private writeFileLine(label: string, message: string, data?: unknown): void {
    if (!this.logFile) return;
    const stamp = new Date().toISOString();
    let line = `${stamp} ${label} ${message}\n`;
    if (data !== undefined) {
      line += `${JSON.stringify(data)}\n`;
    }
    appendFileSync(this.logFile, line, 'utf-8');
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.writeFileLine('DEBUG', message, data);
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.writeFileLine('INFO', message, data);
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(`[INFO] ${message}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.writeFileLine('WARN', message, data);
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    this.writeFileLine('ERROR', message, error instanceof Error ? error.message : error);
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (always shown unless silent).
   */
  success(message: string): void {
    this.writeFileLine('INFO', message);
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (always shown unless silent).
   */
  fail(message: string): void {
    this.writeFileLine('ERROR', message);
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
