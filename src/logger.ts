/**
 * Kernel Wrapper - Logger
 * Console output with colors and spinners, or plain lines appended to a log file
 */

import { appendFileSync } from 'fs';
import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Ora } from 'ora';
import { OutputStreamError } from './errors.js';
import type { LogLevel } from './types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  quiet: 0,
  normal: 1,
  verbose: 2,
};

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'normal';
  private outputPath: string | null = null;
  private currentSpinner: Ora | null = null;
  private stepTimes: Map<string, number> = new Map();

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Send all further output to a file. Allowed once per run.
   */
  redirect(path: string): void {
    if (this.outputPath !== null) {
      throw new OutputStreamError(`Output is already written to ${this.outputPath}`);
    }
    this.stopSpinner();
    this.outputPath = path;
  }

  getOutputPath(): string | null {
    return this.outputPath;
  }

  info(message: string): void {
    this.emit('normal', chalk.blue, '[INFO]', message);
  }

  success(message: string): void {
    this.emit('normal', chalk.green, '[✓]', message);
  }

  warn(message: string): void {
    this.emit('quiet', chalk.yellow, '[WARN]', message);
  }

  error(message: string): void {
    this.emit('quiet', chalk.red, '[ERROR]', message, true);
  }

  /**
   * Shown with --log-level verbose only
   */
  debug(message: string): void {
    this.emit('verbose', chalk.gray, '[DEBUG]', message);
  }

  step(message: string): void {
    this.emit('normal', chalk.cyan, '==>', message);
  }

  section(title: string): void {
    if (!this.enabled('normal')) return;
    const border = '='.repeat(40);
    this.write('');
    this.write(border, chalk.cyan);
    this.write(title, chalk.cyan);
    this.write(border, chalk.cyan);
    this.write('');
  }

  /**
   * Start a spinner for long-running operations. No spinner is drawn into a
   * log file or in quiet mode.
   */
  startSpinner(text: string): Ora | null {
    this.stopSpinner();
    if (this.outputPath !== null || !this.enabled('normal')) {
      return null;
    }
    this.currentSpinner = ora({
      text,
      color: 'cyan',
    }).start();
    return this.currentSpinner;
  }

  stopSpinner(): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      this.currentSpinner = null;
    }
  }

  spinnerSuccess(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.succeed(text);
      this.currentSpinner = null;
    }
  }

  spinnerFail(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail(text);
      this.currentSpinner = null;
    }
  }

  startTimer(name: string): void {
    this.stepTimes.set(name, Date.now());
  }

  getElapsed(name: string): number {
    const start = this.stepTimes.get(name);
    if (!start) return 0;
    return (Date.now() - start) / 1000;
  }

  /**
   * Log step completion with timing
   */
  stepComplete(name: string, message?: string): void {
    const elapsed = this.getElapsed(name);
    const text = message ?? name;
    this.success(`${text} (${elapsed.toFixed(1)}s)`);
    this.stepTimes.delete(name);
  }

  private enabled(minimum: LogLevel): boolean {
    return LEVEL_RANK[this.level] >= LEVEL_RANK[minimum];
  }

  private emit(
    minimum: LogLevel,
    color: ChalkInstance,
    tag: string,
    message: string,
    toStderr: boolean = false
  ): void {
    if (!this.enabled(minimum)) return;
    this.stopSpinner();
    if (this.outputPath !== null) {
      appendFileSync(this.outputPath, `${tag} ${message}\n`);
    } else if (toStderr) {
      console.error(color(tag), message);
    } else {
      console.log(color(tag), message);
    }
  }

  private write(line: string, color?: ChalkInstance): void {
    if (this.outputPath !== null) {
      appendFileSync(this.outputPath, `${line}\n`);
    } else {
      console.log(color ? color(line) : line);
    }
  }
}

// Export singleton
export const logger = Logger.getInstance();
