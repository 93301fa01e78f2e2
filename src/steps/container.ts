/**
 * Kernel Wrapper - Container Engine
 * Runs a build inside Docker or Podman by re-invoking the wrapper there
 */

import { OUTPUT_DIRS } from '../env.js';
import { ConfigError } from '../errors.js';
import { execInherit, requireCommands } from '../exec.js';
import { logger } from '../logger.js';
import { toContainerArgv, type ContainerParameterSet } from '../projector.js';
import {
  CONTAINER_ENGINES,
  type BuildStepResult,
  type ContainerEngineName,
  type RuntimeConfig,
} from '../types.js';

export interface ContainerPlan {
  engine: ContainerEngineName;
  containerName: string;
  build: string[];
  run: string[];
  copyOut: string[];
  remove: string[];
  // Set when the image is to be removed after the build
  removeImage?: string[];
}

export function resolveEngine(params: ContainerParameterSet): ContainerEngineName {
  const engine = CONTAINER_ENGINES.find((name) => name === params.buildenv);
  if (engine === undefined) {
    throw new ConfigError(`'${params.buildenv}' is not a container engine`);
  }
  return engine;
}

/**
 * Engine command lines for one containerized build
 */
export function planContainerRun(
  config: RuntimeConfig,
  params: ContainerParameterSet
): ContainerPlan {
  const engine = resolveEngine(params);
  const { image, workdir, entry } = config.settings.container;
  const containerName = `${image}-${params.build_module}-${params.codename}`;
  const outputDir = OUTPUT_DIRS[params.build_module];

  const plan: ContainerPlan = {
    engine,
    containerName,
    build: [engine, 'build', '-t', image, '.'],
    run: [engine, 'run', '--name', containerName, image, ...entry, ...toContainerArgv(params)],
    copyOut: [engine, 'cp', `${containerName}:${workdir}/${outputDir}`, config.rootPath],
    remove: [engine, 'rm', '--force', containerName],
  };

  if (params.clean_image) {
    plan.removeImage = [engine, 'rmi', image];
  }

  return plan;
}

async function run(config: RuntimeConfig, commandLine: readonly string[]): Promise<number> {
  const [command, ...args] = commandLine;
  return execInherit(command, args, { cwd: config.rootPath });
}

export async function runInContainer(
  config: RuntimeConfig,
  params: ContainerParameterSet
): Promise<BuildStepResult> {
  const startTime = Date.now();
  const plan = planContainerRun(config, params);

  const failed = (error: string): BuildStepResult => {
    logger.error(error);
    return { success: false, duration: Date.now() - startTime, error };
  };

  const missing = await requireCommands([plan.engine]);
  if (missing.length > 0) {
    return failed(`${plan.engine} is not installed on this machine`);
  }

  logger.section(`Containerized build (${plan.engine}: ${params.build_module})`);

  logger.step(`Building image ${config.settings.container.image}...`);
  if ((await run(config, plan.build)) !== 0) {
    return failed('Image build failed');
  }

  let result: BuildStepResult;
  try {
    logger.step(`Running ${params.build_module} in container ${plan.containerName}...`);
    if ((await run(config, plan.run)) !== 0) {
      result = failed(`Build inside ${plan.containerName} failed`);
    } else {
      logger.step('Copying build output from container...');
      result = (await run(config, plan.copyOut)) !== 0
        ? failed('Copying build output from container failed')
        : { success: true, duration: Date.now() - startTime };
    }
  } finally {
    await run(config, plan.remove);
  }

  if (plan.removeImage) {
    logger.step(`Removing image ${config.settings.container.image}...`);
    await run(config, plan.removeImage);
  }

  if (result.success) {
    logger.success(`Containerized ${params.build_module} build complete`);
  }
  return result;
}
