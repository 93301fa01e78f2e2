/**
 * Kernel Wrapper - Dispatcher
 * Picks the build mode for an invocation and hands the work to its step
 */

import { loadDeviceCatalog, type DeviceCatalog } from './config.js';
import { createRuntimeConfig, setupOutputStream } from './env.js';
import {
  CollaboratorError,
  formatErrorMessage,
  isWrapperError,
} from './errors.js';
import { probeHost } from './exec.js';
import { logger, type Logger } from './logger.js';
import { projectContainerParameters, type ContainerParameterSet } from './projector.js';
import {
  buildKernel,
  cleanRoot,
  collectAssets,
  createBundle,
  runInContainer,
  type AssetCollectOptions,
  type BundleCreateOptions,
  type KernelBuildOptions,
} from './steps/index.js';
import type {
  BuildRequest,
  BuildStepResult,
  DeviceDescriptor,
  HostFacts,
  Invocation,
  RuntimeConfig,
} from './types.js';
import { validateSettings } from './validation.js';

export type BuildMode =
  | 'help'
  | 'clean'
  | 'container'
  | 'local-kernel'
  | 'local-assets'
  | 'local-bundle';

export interface Collaborators {
  cleanRoot(rootPath: string): Promise<BuildStepResult>;
  buildKernel(config: RuntimeConfig, options: KernelBuildOptions): Promise<BuildStepResult>;
  collectAssets(
    config: RuntimeConfig,
    device: DeviceDescriptor,
    options: AssetCollectOptions
  ): Promise<BuildStepResult>;
  createBundle(
    config: RuntimeConfig,
    device: DeviceDescriptor,
    options: BundleCreateOptions
  ): Promise<BuildStepResult>;
  runInContainer(config: RuntimeConfig, params: ContainerParameterSet): Promise<BuildStepResult>;
}

export interface DispatchContext {
  rootPath: string;
  collaborators: Collaborators;
  createRuntimeConfig(rootPath: string, request: BuildRequest): Promise<RuntimeConfig>;
  loadDeviceCatalog(rootPath: string): Promise<DeviceCatalog>;
  probeHost(): Promise<HostFacts>;
  printHelp(): void;
  logger: Logger;
}

export const defaultCollaborators: Collaborators = {
  cleanRoot,
  buildKernel,
  collectAssets,
  createBundle,
  runInContainer,
};

export function createDispatchContext(
  rootPath: string,
  printHelp: () => void
): DispatchContext {
  return {
    rootPath,
    collaborators: defaultCollaborators,
    createRuntimeConfig,
    loadDeviceCatalog,
    probeHost,
    printHelp,
    logger,
  };
}

export function resolveMode(invocation: Invocation): BuildMode {
  switch (invocation.kind) {
    case 'help':
    case 'clean':
      return invocation.kind;
    case 'build':
      if (invocation.request.buildenv !== 'local') return 'container';
      return `local-${invocation.request.command}`;
  }
}

async function invokeStep(
  name: string,
  step: () => Promise<BuildStepResult>
): Promise<void> {
  let result: BuildStepResult;
  try {
    result = await step();
  } catch (err) {
    if (isWrapperError(err)) throw err;
    throw new CollaboratorError(`${name} failed: ${formatErrorMessage(err)}`, { cause: err });
  }
  if (!result.success) {
    throw new CollaboratorError(`${name} failed${result.error ? `: ${result.error}` : ''}`);
  }
}

async function dispatchBuild(
  request: BuildRequest,
  config: RuntimeConfig,
  device: DeviceDescriptor,
  collaborators: Collaborators
): Promise<void> {
  if (request.buildenv !== 'local') {
    const params = projectContainerParameters(request);
    return invokeStep('Containerized build', () => collaborators.runInContainer(config, params));
  }

  switch (request.command) {
    case 'kernel': {
      const options: KernelBuildOptions = {
        codename: request.codename,
        losversion: request.losversion,
        clean: request.clean,
      };
      return invokeStep('Kernel build', () => collaborators.buildKernel(config, options));
    }
    case 'assets': {
      const options: AssetCollectOptions = {
        codename: request.codename,
        losversion: request.losversion,
        chroot: request.chroot,
        clean: request.clean,
        romOnly: request.romOnly,
        extraAssets: request.extraAssets,
      };
      return invokeStep('Asset collection', () =>
        collaborators.collectAssets(config, device, options)
      );
    }
    case 'bundle': {
      const options: BundleCreateOptions = {
        codename: request.codename,
        losversion: request.losversion,
        packageType: request.packageType,
        conanUpload: request.conanUpload,
      };
      return invokeStep('Bundle creation', () =>
        collaborators.createBundle(config, device, options)
      );
    }
  }
}

/**
 * Run one invocation to completion and return the process exit code.
 * Failures are thrown as WrapperError.
 */
export async function runInvocation(
  invocation: Invocation,
  ctx: DispatchContext
): Promise<number> {
  const mode = resolveMode(invocation);

  if (invocation.kind === 'help') {
    ctx.printHelp();
    return 0;
  }

  if (invocation.kind === 'clean') {
    await invokeStep('Cleaning', () => ctx.collaborators.cleanRoot(ctx.rootPath));
    return 0;
  }

  const { request } = invocation;
  const config = await ctx.createRuntimeConfig(ctx.rootPath, request);
  const catalog = await ctx.loadDeviceCatalog(config.rootPath);
  // Only local builds run on the host itself
  const host = request.buildenv === 'local' ? await ctx.probeHost() : null;

  const validation = validateSettings(request, catalog, host);
  if (!validation.ok) {
    throw validation.error;
  }

  ctx.logger.setLevel(config.logLevel);
  await setupOutputStream(config, ctx.logger);

  ctx.logger.debug(`Build mode: ${mode}`);
  await dispatchBuild(request, config, validation.device, ctx.collaborators);
  return 0;
}
