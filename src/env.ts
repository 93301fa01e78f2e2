/**
 * Kernel Wrapper - Runtime Environment
 * Resolves the root path, builds the run configuration and exports it to child processes
 */

import { existsSync, realpathSync } from 'fs';
import { writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, resolve } from 'path';
import { loadProductMetadata, loadWrapperSettings } from './config.js';
import { OutputStreamError, formatErrorMessage } from './errors.js';
import { logger, type Logger } from './logger.js';
import type { BuildCommand, BuildRequest, RuntimeConfig } from './types.js';

// Directories the steps write into, relative to the root path
export const OUTPUT_DIRS: Readonly<Record<BuildCommand, string>> = {
  kernel: 'kernel-build',
  assets: 'assets',
  bundle: 'bundle',
};

// Kernel sources checked out next to the wrapper
export const SOURCE_DIR = 'source';

export function getOutputDir(config: RuntimeConfig, command: BuildCommand): string {
  return join(config.rootPath, OUTPUT_DIRS[command]);
}

/**
 * Find the root path: the real directory of the entry point, or the closest
 * parent of it holding manifests/info.json.
 */
export function findProjectRoot(entryPath: string): string {
  const entryDir = dirname(realpathSync(entryPath));
  let dir = entryDir;

  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, 'manifests', 'info.json'))) {
      return dir;
    }
    dir = dirname(dir);
  }

  return entryDir;
}

/**
 * Build the immutable configuration of this run
 */
export async function createRuntimeConfig(
  rootPath: string,
  request: BuildRequest
): Promise<RuntimeConfig> {
  const product = await loadProductMetadata(rootPath);
  const settings = await loadWrapperSettings(rootPath);

  return Object.freeze({
    rootPath,
    logLevel: request.logLevel,
    product,
    outputLog: request.outputLog,
    settings,
  });
}

export function resolveOutputLog(config: RuntimeConfig): string | undefined {
  if (config.outputLog === undefined) return undefined;
  return isAbsolute(config.outputLog)
    ? config.outputLog
    : resolve(config.rootPath, config.outputLog);
}

/**
 * Switch logging to the requested output file, truncating an old one
 */
export async function setupOutputStream(
  config: RuntimeConfig,
  log: Logger = logger
): Promise<void> {
  const path = resolveOutputLog(config);
  if (path === undefined) return;

  const current = log.getOutputPath();
  if (current !== null) {
    throw new OutputStreamError(`Output is already written to ${current}`);
  }

  log.info(`Writing output to ${config.outputLog}`);
  // Output stays on the console unless the log file can be written
  try {
    await writeFile(path, '');
  } catch (err) {
    throw new OutputStreamError(
      `Cannot write output log ${config.outputLog}: ${formatErrorMessage(err)}`,
      { cause: err }
    );
  }
  log.redirect(path);
}

/**
 * Export environment variables for child processes
 */
export function getExportedEnv(config: RuntimeConfig): Record<string, string> {
  const env: Record<string, string> = {
    ROOTPATH: config.rootPath,
    LOGLEVEL: config.logLevel,
    KNAME: config.product.name,
    KVERSION: config.product.version,
  };

  const outputLog = resolveOutputLog(config);
  if (outputLog !== undefined) {
    env.OSTREAM = outputLog;
  }

  return env;
}
