/**
 * Kernel Wrapper - Bundle Creator
 * Builds the kernel, collects assets and packages both
 */

import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { getExportedEnv, getOutputDir } from '../env.js';
import { execInherit, expandCommand } from '../exec.js';
import { ucopy } from '../fileops.js';
import { logger } from '../logger.js';
import type {
  BuildStepResult,
  DeviceDescriptor,
  PackageType,
  ProductMetadata,
  RuntimeConfig,
} from '../types.js';
import { collectAssets } from './assets.js';
import { buildKernel } from './kernel.js';

export interface BundleCreateOptions {
  codename: string;
  losversion: string;
  packageType: PackageType;
  conanUpload: boolean;
}

export function bundleArchiveName(
  product: ProductMetadata,
  codename: string,
  losversion: string
): string {
  return `${product.name}-${product.version}_${codename}_los${losversion}.zip`;
}

function failed(startTime: number, error: string): BuildStepResult {
  logger.error(error);
  return { success: false, duration: Date.now() - startTime, error };
}

export async function createBundle(
  config: RuntimeConfig,
  device: DeviceDescriptor,
  options: BundleCreateOptions
): Promise<BuildStepResult> {
  const startTime = Date.now();

  const kernelResult = await buildKernel(config, {
    codename: options.codename,
    losversion: options.losversion,
    clean: false,
  });
  if (!kernelResult.success) return kernelResult;

  // A slim package carries the ROM only
  const assetsResult = await collectAssets(config, device, {
    codename: options.codename,
    losversion: options.losversion,
    chroot: 'full',
    clean: false,
    romOnly: options.packageType === 'generic-slim',
  });
  if (!assetsResult.success) return assetsResult;

  logger.section(`Creating ${options.packageType} bundle`);

  const bundleDir = getOutputDir(config, 'bundle');
  await rm(bundleDir, { recursive: true, force: true });
  await mkdir(bundleDir, { recursive: true });

  logger.step('Staging kernel and assets...');
  await ucopy(getOutputDir(config, 'kernel'), join(bundleDir, 'kernel'));
  await ucopy(getOutputDir(config, 'assets'), join(bundleDir, 'assets'));

  const env = getExportedEnv(config);

  if (options.packageType === 'generic-slim') {
    const archive = bundleArchiveName(config.product, options.codename, options.losversion);
    const exitCode = await execInherit('zip', ['-r', archive, 'kernel', 'assets'], {
      cwd: bundleDir,
      env,
    });
    if (exitCode !== 0) {
      return failed(startTime, `zip exited with code ${exitCode}`);
    }
    logger.success(`Bundle created: ${join(bundleDir, archive)}`);
    return { success: true, duration: Date.now() - startTime };
  }

  const values = {
    name: config.product.name,
    version: config.product.version,
    codename: options.codename,
    losversion: options.losversion,
    bundledir: bundleDir,
  };

  logger.step('Creating Conan package...');
  const [create, ...createArgs] = expandCommand(config.settings.conan.create, values);
  const createCode = await execInherit(create, createArgs, { cwd: bundleDir, env });
  if (createCode !== 0) {
    return failed(startTime, `${create} exited with code ${createCode}`);
  }

  if (options.conanUpload) {
    logger.step('Uploading Conan package...');
    const [upload, ...uploadArgs] = expandCommand(config.settings.conan.upload, values);
    const uploadCode = await execInherit(upload, uploadArgs, { cwd: bundleDir, env });
    if (uploadCode !== 0) {
      return failed(startTime, `${upload} exited with code ${uploadCode}`);
    }
  }

  logger.success('Conan package created');

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
