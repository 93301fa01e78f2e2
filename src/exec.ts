/**
 * Kernel Wrapper - Command Executor
 * Wraps execa for consistent command execution with logging
 */

import { execa } from 'execa';
import { logger } from './logger.js';
import type { ExecOptions, HostFacts } from './types.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Execute a command with captured output. Never throws for a failing or
 * missing command; the exit code tells.
 */
export async function exec(
  command: string,
  args: readonly string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  logger.debug(`$ ${[command, ...args].join(' ')}`);

  const result = await execa(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: options.stdio ?? 'pipe',
    reject: false,
  });

  return {
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    // A command that could not be spawned has no exit code
    exitCode: result.failed ? (result.exitCode ?? 127) : 0,
  };
}

/**
 * Execute a command with inherited stdio (shows output in real-time)
 */
export async function execInherit(
  command: string,
  args: readonly string[],
  options: ExecOptions = {}
): Promise<number> {
  const result = await exec(command, args, { ...options, stdio: 'inherit' });
  return result.exitCode;
}

/**
 * Check if required commands exist
 */
export async function requireCommands(commands: readonly string[]): Promise<string[]> {
  const missing: string[] = [];

  for (const cmd of commands) {
    const result = await exec('which', [cmd]);
    if (result.exitCode !== 0) {
      missing.push(cmd);
    }
  }

  return missing;
}

/**
 * Probe the host: operating system, and whether apt answers.
 */
export async function probeHost(): Promise<HostFacts> {
  const platform = process.platform;
  if (platform !== 'linux') {
    return { platform, debianFamily: false };
  }
  const apt = await exec('apt', ['--version']);
  return { platform, debianFamily: apt.exitCode === 0 };
}

/**
 * Replace {placeholder} tokens in a configured command line.
 */
export function expandCommand(
  template: readonly string[],
  values: Readonly<Record<string, string>>
): string[] {
  return template.map((part) =>
    part.replace(/\{(\w+)\}/g, (token, key: string) => values[key] ?? token)
  );
}

/**
 * Run a timed build step
 */
export async function timedStep<T>(
  name: string,
  fn: () => Promise<T>
): Promise<T> {
  logger.startTimer(name);
  logger.startSpinner(name);

  try {
    const result = await fn();
    logger.spinnerSuccess();
    logger.stepComplete(name);
    return result;
  } catch (error) {
    logger.spinnerFail();
    logger.error(`${name} failed`);
    throw error;
  }
}
