/**
 * Kernel Wrapper - Container Parameters
 *
 * Only the fields of ContainerParameterSet ever reach a build running inside
 * a container. Host-only settings such as the output log path stay behind.
 */

import { ConfigError } from './errors.js';
import type { BuildCommand, BuildEnv, BuildRequest, ChrootType, PackageType } from './types.js';

export interface ContainerParameterSet {
  buildenv: BuildEnv;
  build_module: BuildCommand;
  codename: string;
  losversion: string;
  clean_image?: boolean;
  chroot?: ChrootType;
  package_type?: PackageType;
  clean_kernel?: boolean;
  clean_assets?: boolean;
  rom_only?: boolean;
  extra_assets?: string;
  conan_upload?: boolean;
}

export const CONTAINER_PARAMETER_KEYS = [
  'buildenv',
  'build_module',
  'codename',
  'losversion',
  'clean_image',
  'chroot',
  'package_type',
  'clean_kernel',
  'clean_assets',
  'rom_only',
  'extra_assets',
  'conan_upload',
] as const satisfies readonly (keyof ContainerParameterSet)[];

export function projectContainerParameters(request: BuildRequest): ContainerParameterSet {
  const base: ContainerParameterSet = {
    buildenv: request.buildenv,
    build_module: request.command,
    codename: request.codename,
    losversion: request.losversion,
    clean_image: request.cleanImage,
  };

  switch (request.command) {
    case 'kernel':
      return base;
    case 'assets': {
      const params: ContainerParameterSet = {
        ...base,
        chroot: request.chroot,
        rom_only: request.romOnly,
      };
      if (request.extraAssets !== undefined) {
        params.extra_assets = request.extraAssets;
      }
      return params;
    }
    case 'bundle':
      return {
        ...base,
        package_type: request.packageType,
        conan_upload: request.conanUpload,
      };
  }
}

/**
 * Command line for the wrapper started inside the container. The build
 * itself always runs locally there.
 */
export function toContainerArgv(params: ContainerParameterSet): string[] {
  const argv: string[] = [params.build_module, 'local', params.losversion, params.codename];

  switch (params.build_module) {
    case 'kernel':
      if (params.clean_kernel) argv.push('--clean');
      break;
    case 'assets':
      if (params.chroot === undefined) {
        throw new ConfigError('Container parameters for assets carry no chroot type');
      }
      argv.push(params.chroot);
      if (params.rom_only) argv.push('--rom-only');
      if (params.clean_assets) argv.push('--clean');
      if (params.extra_assets !== undefined) argv.push('--extra-assets', params.extra_assets);
      break;
    case 'bundle':
      if (params.package_type === undefined) {
        throw new ConfigError('Container parameters for bundle carry no package type');
      }
      argv.push(params.package_type);
      if (params.conan_upload) argv.push('--conan-upload');
      break;
  }

  return argv;
}
