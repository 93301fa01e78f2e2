/**
 * Kernel Wrapper - Clean
 */

import { readdir, rm } from 'fs/promises';
import { join } from 'path';
import { OUTPUT_DIRS, SOURCE_DIR } from '../env.js';
import { logger } from '../logger.js';
import type { BuildStepResult } from '../types.js';

/**
 * Remove build outputs, kernel sources and log files from the root path
 */
export async function cleanRoot(rootPath: string): Promise<BuildStepResult> {
  logger.section('Cleaning Root Directory');

  const startTime = Date.now();

  for (const dir of [...Object.values(OUTPUT_DIRS), SOURCE_DIR]) {
    logger.step(`Removing ${dir}...`);
    await rm(join(rootPath, dir), { recursive: true, force: true });
  }

  const logs = (await readdir(rootPath)).filter((name) => name.endsWith('.log'));
  for (const log of logs) {
    await rm(join(rootPath, log), { force: true });
  }

  logger.success('Clean complete');

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
