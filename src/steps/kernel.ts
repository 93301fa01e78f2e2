/**
 * Kernel Wrapper - Kernel Builder
 */

import { mkdir, rm } from 'fs/promises';
import { getExportedEnv, getOutputDir } from '../env.js';
import { execInherit, expandCommand } from '../exec.js';
import { logger } from '../logger.js';
import type { BuildStepResult, RuntimeConfig } from '../types.js';

export interface KernelBuildOptions {
  codename: string;
  losversion: string;
  clean: boolean;
}

export async function buildKernel(
  config: RuntimeConfig,
  options: KernelBuildOptions
): Promise<BuildStepResult> {
  const startTime = Date.now();
  const outDir = getOutputDir(config, 'kernel');

  if (options.clean) {
    logger.step('Cleaning kernel build directory...');
    await rm(outDir, { recursive: true, force: true });
    logger.success('Kernel build directory cleaned');
    return { success: true, duration: Date.now() - startTime };
  }

  logger.section(
    `Building ${config.product.name} ${config.product.version} (${options.codename}, LineageOS ${options.losversion})`
  );

  await mkdir(outDir, { recursive: true });

  const [command, ...args] = expandCommand(config.settings.kernel.command, {
    codename: options.codename,
    losversion: options.losversion,
    outdir: outDir,
  });

  logger.step('Compiling kernel...');
  const exitCode = await execInherit(command, args, {
    cwd: config.rootPath,
    env: {
      ...getExportedEnv(config),
      CODENAME: options.codename,
      LOSVERSION: options.losversion,
    },
  });

  if (exitCode !== 0) {
    logger.error('Kernel compilation failed');
    return {
      success: false,
      duration: Date.now() - startTime,
      error: `${command} exited with code ${exitCode}`,
    };
  }

  logger.success(`Kernel built: ${outDir}`);

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
