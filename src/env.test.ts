import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createRuntimeConfig,
  findProjectRoot,
  getExportedEnv,
  getOutputDir,
  setupOutputStream,
} from './env.js';
import { OutputStreamError } from './errors.js';
import { Logger } from './logger.js';
import type { KernelRequest, RuntimeConfig } from './types.js';

const SETTINGS = `
container: { image: test-image, workdir: /work, entry: [node, dist/cli.js] }
kernel: { command: [make] }
assets:
  chroot: { full: "https://example.com/full.tar.xz", minimal: "https://example.com/min.tar.xz" }
conan: { create: [conan, create, .], upload: [conan, upload] }
`;

const request: KernelRequest = {
  command: 'kernel',
  buildenv: 'local',
  losversion: '20.0',
  codename: 'pixel9',
  clean: false,
  cleanImage: false,
  logLevel: 'verbose',
  outputLog: 'build.log',
};

describe('runtime environment', () => {
  let root: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), 'wrapper-env-')));
    await mkdir(join(root, 'manifests'));
    await mkdir(join(root, 'config'));
    await writeFile(join(root, 'manifests', 'info.json'), '{"name":"test-kernel","version":"1.2"}');
    await writeFile(join(root, 'config', 'wrapper.yaml'), SETTINGS);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('findProjectRoot', () => {
    it('walks up from the entry point to the manifests', async () => {
      await mkdir(join(root, 'dist'));
      const entry = join(root, 'dist', 'cli.js');
      await writeFile(entry, '');
      expect(findProjectRoot(entry)).toBe(root);
    });

    it('falls back to the entry directory', async () => {
      const other = await realpath(await mkdtemp(join(tmpdir(), 'wrapper-entry-')));
      const entry = join(other, 'cli.js');
      await writeFile(entry, '');
      try {
        expect(findProjectRoot(entry)).toBe(other);
      } finally {
        await rm(other, { recursive: true, force: true });
      }
    });
  });

  describe('createRuntimeConfig', () => {
    it('builds a frozen configuration from the manifests and the request', async () => {
      const config = await createRuntimeConfig(root, request);
      expect(config.rootPath).toBe(root);
      expect(config.logLevel).toBe('verbose');
      expect(config.product).toEqual({ name: 'test-kernel', version: '1.2' });
      expect(config.outputLog).toBe('build.log');
      expect(config.settings.container.image).toBe('test-image');
      expect(Object.isFrozen(config)).toBe(true);
    });
  });

  describe('getExportedEnv', () => {
    it('exports the run settings for child processes', async () => {
      const config = await createRuntimeConfig(root, request);
      expect(getExportedEnv(config)).toEqual({
        ROOTPATH: root,
        LOGLEVEL: 'verbose',
        KNAME: 'test-kernel',
        KVERSION: '1.2',
        OSTREAM: join(root, 'build.log'),
      });
    });

    it('leaves out OSTREAM without an output log', async () => {
      const config = await createRuntimeConfig(root, { ...request, outputLog: undefined });
      expect(getExportedEnv(config)).not.toHaveProperty('OSTREAM');
    });
  });

  describe('setupOutputStream', () => {
    let config: RuntimeConfig;

    beforeEach(async () => {
      config = await createRuntimeConfig(root, request);
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('replaces an existing log file and redirects output into it', async () => {
      const logPath = join(root, 'build.log');
      await writeFile(logPath, 'stale output\n');
      const log = new Logger();

      await setupOutputStream(config, log);
      log.info('compiling');

      expect(log.getOutputPath()).toBe(logPath);
      expect(await readFile(logPath, 'utf-8')).toBe('[INFO] compiling\n');
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it('redirects at most once', async () => {
      const log = new Logger();
      await setupOutputStream(config, log);
      await expect(setupOutputStream(config, log)).rejects.toThrow(OutputStreamError);
    });

    it('keeps output on the console when the log file cannot be created', async () => {
      const log = new Logger();
      await expect(
        setupOutputStream({ ...config, outputLog: join('logs', 'build.log') }, log)
      ).rejects.toThrow(OutputStreamError);

      expect(log.getOutputPath()).toBeNull();
      log.error('still visible');
      expect(console.error).toHaveBeenCalledOnce();
    });

    it('does nothing without an output log', async () => {
      const log = new Logger();
      await setupOutputStream({ ...config, outputLog: undefined }, log);
      expect(log.getOutputPath()).toBeNull();
      expect(existsSync(join(root, 'build.log'))).toBe(false);
    });
  });

  it('places step output under the root path', async () => {
    const config = await createRuntimeConfig(root, request);
    expect(getOutputDir(config, 'kernel')).toBe(join(root, 'kernel-build'));
    expect(getOutputDir(config, 'assets')).toBe(join(root, 'assets'));
  });
});
