/**
 * Kernel Wrapper - Command Line
 */

import chalk from 'chalk';
import { Argument, Command, InvalidArgumentError, Option, type OutputConfiguration } from 'commander';
import {
  BUILD_ENVS,
  CHROOT_TYPES,
  LOG_LEVELS,
  PACKAGE_TYPES,
  type BuildRequest,
  type Invocation,
} from './types.js';

interface CommonOptions {
  cleanImage?: boolean;
  logLevel: string;
  output?: string;
}

interface KernelOptions extends CommonOptions {
  clean?: boolean;
}

interface AssetsOptions extends CommonOptions {
  extraAssets?: string;
  romOnly?: boolean;
  clean?: boolean;
}

interface BundleOptions extends CommonOptions {
  conanUpload?: boolean;
}

const HELP = {
  buildenv: 'select build environment',
  losversion: 'select LineageOS version',
  codename: 'select device codename',
  cleanImage: 'remove Docker/Podman image from the host machine after build',
  logLevel: 'select log level',
  output: 'save logs to a file',
};

function oneOf<T extends string>(choices: readonly T[], value: string, name: string): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new InvalidArgumentError(`${name} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

function addCommonArguments(command: Command): Command {
  return command
    .addArgument(new Argument('<buildenv>', HELP.buildenv).choices(BUILD_ENVS))
    .argument('<losversion>', HELP.losversion)
    .argument('<codename>', HELP.codename);
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--clean-image', HELP.cleanImage)
    .addOption(new Option('--log-level <level>', HELP.logLevel).choices(LOG_LEVELS).default('normal'))
    .option('-o, --output <file>', HELP.output);
}

function common(buildenv: string, losversion: string, codename: string, options: CommonOptions) {
  return {
    buildenv: oneOf(BUILD_ENVS, buildenv, 'buildenv'),
    losversion,
    codename,
    cleanImage: options.cleanImage === true,
    logLevel: oneOf(LOG_LEVELS, options.logLevel, 'log level'),
    outputLog: options.output,
  };
}

/**
 * Build the commander program. Every successful parse ends in exactly one
 * call of onInvocation.
 */
export function createProgram(
  onInvocation: (invocation: Invocation) => void,
  output?: OutputConfiguration
): Command {
  const program = new Command();

  program
    .name('kernel-wrapper')
    .description('A custom wrapper for the kernel build pipelines.')
    .enablePositionalOptions()
    .exitOverride()
    .showHelpAfterError('(use "kernel-wrapper --help" for available commands)')
    .configureOutput({
      outputError: (str, write) => write(`${chalk.red('Error:')} ${str}`),
      ...output,
    })
    .option('--clean', 'clean the root directory')
    .action((options: { clean?: boolean }, command: Command) => {
      const [unknown] = command.args;
      if (unknown !== undefined) {
        command.error(`unknown command '${unknown}'`);
      }
      onInvocation(options.clean ? { kind: 'clean' } : { kind: 'help' });
    });

  // The top-level --clean wins over any subcommand
  const emit = (request: BuildRequest): void => {
    const { clean } = program.opts<{ clean?: boolean }>();
    onInvocation(clean ? { kind: 'clean' } : { kind: 'build', request: Object.freeze(request) });
  };

  // kernel
  const kernel = program.command('kernel').description('build the kernel');
  addCommonArguments(kernel)
    .option('-c, --clean', "don't build anything, just clean the environment");
  addCommonOptions(kernel).action(
    (buildenv: string, losversion: string, codename: string, options: KernelOptions) => {
      emit({
        command: 'kernel',
        ...common(buildenv, losversion, codename, options),
        clean: options.clean === true,
      });
    }
  );

  // assets
  const assets = program.command('assets').description('collect assets');
  addCommonArguments(assets)
    .addArgument(new Argument('<chroot>', 'select Kali chroot type').choices(CHROOT_TYPES))
    .option('--extra-assets <file>', 'select a JSON file with extra assets')
    .option('--rom-only', 'download only the ROM as an asset')
    .option('--clean', "autoclean 'assets' folder if it exists");
  addCommonOptions(assets).action(
    (
      buildenv: string,
      losversion: string,
      codename: string,
      chroot: string,
      options: AssetsOptions
    ) => {
      emit({
        command: 'assets',
        ...common(buildenv, losversion, codename, options),
        chroot: oneOf(CHROOT_TYPES, chroot, 'chroot'),
        extraAssets: options.extraAssets,
        romOnly: options.romOnly === true,
        clean: options.clean === true,
      });
    }
  );

  // bundle
  const bundle = program.command('bundle').description('build the kernel + collect assets');
  addCommonArguments(bundle)
    .addArgument(
      new Argument('<package_type>', 'select package type of the bundle').choices(PACKAGE_TYPES)
    )
    .option('--conan-upload', 'upload Conan packages to remote');
  addCommonOptions(bundle).action(
    (
      buildenv: string,
      losversion: string,
      codename: string,
      packageType: string,
      options: BundleOptions
    ) => {
      emit({
        command: 'bundle',
        ...common(buildenv, losversion, codename, options),
        packageType: oneOf(PACKAGE_TYPES, packageType, 'package type'),
        conanUpload: options.conanUpload === true,
      });
    }
  );

  return program;
}

/**
 * Parse user arguments (without the node and script paths). No arguments
 * means help. Usage errors surface as a thrown CommanderError.
 */
export function parseArgs(argv: readonly string[], output?: OutputConfiguration): Invocation {
  if (argv.length === 0) {
    return { kind: 'help' };
  }

  let invocation: Invocation = { kind: 'help' };
  const program = createProgram((parsed) => {
    invocation = parsed;
  }, output);
  program.parse([...argv], { from: 'user' });
  return invocation;
}

export function helpText(): string {
  return createProgram(() => undefined).helpInformation();
}
