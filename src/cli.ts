#!/usr/bin/env node
/**
 * Kernel Wrapper - CLI
 * Entry point: parse arguments, settle the root path, run the build
 */

import { CommanderError } from 'commander';
import { fileURLToPath } from 'url';
import { helpText, parseArgs } from './args.js';
import { createDispatchContext, runInvocation } from './dispatcher.js';
import { findProjectRoot } from './env.js';
import { formatErrorMessage } from './errors.js';
import { logger } from './logger.js';
import type { Invocation } from './types.js';

async function main(argv: readonly string[]): Promise<number> {
  let invocation: Invocation;
  try {
    invocation = parseArgs(argv);
  } catch (error) {
    // commander has already printed the usage error or the help text
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const rootPath = findProjectRoot(process.argv[1] ?? fileURLToPath(import.meta.url));
  process.chdir(rootPath);

  const ctx = createDispatchContext(rootPath, () => {
    process.stdout.write(helpText());
  });

  try {
    return await runInvocation(invocation, ctx);
  } catch (error) {
    logger.stopSpinner();
    logger.error(formatErrorMessage(error));
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);
