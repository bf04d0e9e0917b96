import chalk from 'chalk';
import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { getMigrateHome } from './paths.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

class Logger {
  private debugEnabled: boolean;
  private debugLogFile: string | null = null;
  private readonly sessionId: string;
  private silent: boolean;

  constructor() {
    this.sessionId = randomUUID();
    this.debugEnabled = isTruthyFlag(process.env.CONFIG_MIGRATE_DEBUG);
    this.silent = isTruthyFlag(process.env.CONFIG_MIGRATE_SILENT);
    if (this.debugEnabled) {
      this.initializeDebugLogging();
    }
  }

  /**
   * Enable debug mode and initialize debug logging
   * @returns The debug session directory path
   */
  enableDebugMode(): string | null {
    if (!this.debugEnabled) {
      this.debugEnabled = true;
      process.env.CONFIG_MIGRATE_DEBUG = '1';
    }

    if (!this.debugLogFile) {
      this.initializeDebugLogging();
    }

    return this.getDebugSessionDir();
  }

  /**
   * Suppress console output. Debug file logging is unaffected.
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  private initializeDebugLogging(): void {
    const baseDir = join(getMigrateHome(), 'debug');
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const sessionDir = join(baseDir, `session-${timestamp}-${this.sessionId}`);

    try {
      mkdirSync(sessionDir, { recursive: true });
      this.debugLogFile = join(sessionDir, 'migrate.log');
    } catch (error) {
      this.debugLogFile = null;
      console.warn(chalk.yellow(`⚠ Debug logging disabled: ${String(error)}`));
    }
  }

  private getDebugSessionDir(): string | null {
    if (!this.debugLogFile) return null;
    return join(this.debugLogFile, '..');
  }

  getSessionId(): string {
    return this.sessionId;
  }

  private writeToFile(level: string, message: string, ...args: unknown[]): void {
    if (!this.debugLogFile) return;

    const timestamp = new Date().toISOString();
    const suffix = args.length > 0
      ? ' ' + args.map(a => typeof a === 'object' ? JSON.stringify(a) : String(a)).join(' ')
      : '';
    try {
      appendFileSync(this.debugLogFile, `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}\n`, 'utf-8');
    } catch {
      // Log file went away mid-session; stop writing to it
      this.debugLogFile = null;
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.DEBUG, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.log(chalk.blueBright(message), ...args);
    }
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, message, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.INFO, `✓ ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    }
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.WARN, `⚠ ${message}`, ...args);
    }
  }

  error(message: string, error?: Error | unknown): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.debugEnabled) {
      this.writeToFile(LogLevel.ERROR, `✗ ${message}`);
    }

    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.message));
        if (this.debugEnabled) {
          this.writeToFile(LogLevel.ERROR, error.message);
          if (error.stack) {
            console.error(chalk.white(error.stack));
            this.writeToFile(LogLevel.ERROR, error.stack);
          }
        }
      } else {
        console.error(chalk.red(String(error)));
        if (this.debugEnabled) {
          this.writeToFile(LogLevel.ERROR, String(error));
        }
      }
    }
  }
}

export const logger = new Logger();
