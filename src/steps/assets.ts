/**
 * Kernel Wrapper - Asset Collector
 * Gathers the ROM, the Kali chroot and any extra assets for a device
 */

import { existsSync } from 'fs';
import { mkdir, rm } from 'fs/promises';
import { basename, isAbsolute, join, resolve } from 'path';
import { loadExtraAssets } from '../config.js';
import { getOutputDir } from '../env.js';
import { download, ucopy } from '../fileops.js';
import { logger } from '../logger.js';
import type { BuildStepResult, ChrootType, DeviceDescriptor, RuntimeConfig } from '../types.js';

export interface AssetCollectOptions {
  codename: string;
  losversion: string;
  chroot: ChrootType;
  clean: boolean;
  romOnly: boolean;
  extraAssets?: string;
}

function isRemote(asset: string): boolean {
  return /^https?:\/\//.test(asset);
}

export async function collectAssets(
  config: RuntimeConfig,
  device: DeviceDescriptor,
  options: AssetCollectOptions
): Promise<BuildStepResult> {
  logger.section(`Collecting Assets (${device.name})`);

  const startTime = Date.now();
  const assetsDir = getOutputDir(config, 'assets');

  if (existsSync(assetsDir)) {
    if (options.clean) {
      logger.step("Removing old 'assets' folder...");
      await rm(assetsDir, { recursive: true, force: true });
    } else {
      logger.warn(`Reusing existing assets in ${assetsDir}`);
    }
  }
  await mkdir(assetsDir, { recursive: true });

  const romUrl = device.rom?.[options.losversion];
  if (romUrl === undefined) {
    const error = `No ROM listed for ${options.codename} on LineageOS ${options.losversion}`;
    logger.error(error);
    return { success: false, duration: Date.now() - startTime, error };
  }
  await download(romUrl, assetsDir);

  if (options.romOnly) {
    logger.info('ROM only requested, skipping other assets');
    return { success: true, duration: Date.now() - startTime };
  }

  await download(config.settings.assets.chroot[options.chroot], assetsDir);

  if (options.extraAssets !== undefined) {
    const listPath = isAbsolute(options.extraAssets)
      ? options.extraAssets
      : resolve(config.rootPath, options.extraAssets);
    const extras = await loadExtraAssets(listPath);
    logger.info(`Collecting ${extras.length} extra asset(s) from ${options.extraAssets}`);

    for (const asset of extras) {
      if (isRemote(asset)) {
        await download(asset, assetsDir);
      } else {
        const src = resolve(config.rootPath, asset);
        await ucopy(src, join(assetsDir, basename(src)));
      }
    }
  }

  logger.success(`Assets collected: ${assetsDir}`);

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
