/**
 * Kernel Wrapper - File Operations
 * Copying files and directories, downloading files
 */

import { copyFile, cp, mkdir, open, readdir, rm, stat } from 'fs/promises';
import { basename, join } from 'path';
import { TransferError, formatErrorMessage } from './errors.js';
import { timedStep } from './exec.js';
import { logger } from './logger.js';

/**
 * Copy a file, or the contents of a directory, into a destination.
 * Directory entries named in `exceptions` are skipped.
 */
export async function ucopy(
  src: string,
  dst: string,
  exceptions: readonly string[] = []
): Promise<void> {
  try {
    const source = await stat(src);

    if (source.isDirectory()) {
      await mkdir(dst, { recursive: true });
      for (const entry of await readdir(src, { withFileTypes: true })) {
        if (exceptions.includes(entry.name)) continue;
        const from = join(src, entry.name);
        const to = join(dst, entry.name);
        if (entry.isDirectory()) {
          await cp(from, to, { recursive: true });
        } else if (entry.isFile()) {
          await copyFile(from, to);
        }
      }
    } else if (source.isFile()) {
      await copyFile(src, dst);
    }
  } catch (err) {
    throw new TransferError(`Copy of ${src} to ${dst} failed`, { cause: err });
  }
}

/**
 * Name a downloaded file gets: the last path segment of its URL
 */
export function downloadFileName(url: string): string {
  let name: string;
  try {
    name = decodeURIComponent(basename(new URL(url).pathname));
  } catch (err) {
    throw new TransferError(`Invalid download URL ${url}`, { cause: err });
  }
  // The name must stay a single entry inside the target directory
  if (name === '' || name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new TransferError(`Cannot derive a file name from ${url}`);
  }
  return name;
}

/**
 * Download a file into a directory. A partially written file is removed
 * when the transfer fails.
 */
export async function download(url: string, destDir: string = process.cwd()): Promise<string> {
  const file = downloadFileName(url);
  const target = join(destDir, file);

  logger.debug(`Downloading ${url}`);

  let opened = false;
  try {
    await timedStep(`Downloading ${file}`, async () => {
      const response = await fetch(url, { redirect: 'follow' });
      if (!response.ok || response.body === null) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }

      const reader = response.body.getReader();
      const handle = await open(target, 'w');
      opened = true;
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          await handle.write(value);
        }
      } finally {
        await handle.close();
      }
    });
  } catch (err) {
    if (opened) {
      await rm(target, { force: true });
    }
    throw new TransferError(`Download of ${url} failed: ${formatErrorMessage(err)}`, { cause: err });
  }

  return target;
}
