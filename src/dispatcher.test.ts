import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseArgs } from './args.js';
import { DeviceCatalog } from './config.js';
import {
  resolveMode,
  runInvocation,
  type Collaborators,
  type DispatchContext,
} from './dispatcher.js';
import {
  CollaboratorError,
  InvalidArgumentCombinationError,
  UnsupportedDeviceError,
  UnsupportedPlatformError,
} from './errors.js';
import { Logger } from './logger.js';
import type { BuildRequest, BuildStepResult, HostFacts, RuntimeConfig } from './types.js';

const ok: BuildStepResult = { success: true, duration: 0 };

function configFor(request: BuildRequest): RuntimeConfig {
  return {
    rootPath: '/srv/wrapper',
    logLevel: request.logLevel,
    product: { name: 'test-kernel', version: '1.0' },
    outputLog: request.outputLog,
    settings: {
      container: { image: 'test-image', workdir: '/work', entry: ['node', 'dist/cli.js'] },
      kernel: { command: ['true'] },
      assets: {
        chroot: { full: 'https://example.com/full.tar.xz', minimal: 'https://example.com/min.tar.xz' },
      },
      conan: { create: ['true'], upload: ['true'] },
    },
  };
}

function createContext(host: HostFacts = { platform: 'linux', debianFamily: true }) {
  const collaborators = {
    cleanRoot: vi.fn<Collaborators['cleanRoot']>().mockResolvedValue(ok),
    buildKernel: vi.fn<Collaborators['buildKernel']>().mockResolvedValue(ok),
    collectAssets: vi.fn<Collaborators['collectAssets']>().mockResolvedValue(ok),
    createBundle: vi.fn<Collaborators['createBundle']>().mockResolvedValue(ok),
    runInContainer: vi.fn<Collaborators['runInContainer']>().mockResolvedValue(ok),
  };
  const ctx = {
    rootPath: '/srv/wrapper',
    collaborators,
    createRuntimeConfig: vi.fn(async (_rootPath: string, request: BuildRequest) => configFor(request)),
    loadDeviceCatalog: vi.fn(async () => new DeviceCatalog({ pixel9: { name: 'Test Phone 9' } })),
    probeHost: vi.fn(async () => host),
    printHelp: vi.fn(),
    logger: new Logger(),
  } satisfies DispatchContext;
  return { ctx, collaborators };
}

function invocation(...argv: string[]) {
  return parseArgs(argv);
}

describe('resolveMode', () => {
  it.each([
    [[], 'help'],
    [['--clean'], 'clean'],
    [['kernel', 'local', '20.0', 'pixel9'], 'local-kernel'],
    [['assets', 'local', '20.0', 'pixel9', 'full'], 'local-assets'],
    [['bundle', 'local', '20.0', 'pixel9', 'conan'], 'local-bundle'],
    [['kernel', 'docker', '20.0', 'pixel9'], 'container'],
    [['bundle', 'podman', '20.0', 'pixel9', 'conan'], 'container'],
  ])('resolves %j to %s', (argv, mode) => {
    expect(resolveMode(parseArgs(argv))).toBe(mode);
  });
});

describe('runInvocation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints help without touching anything else', async () => {
    const { ctx, collaborators } = createContext();
    await expect(runInvocation(invocation(), ctx)).resolves.toBe(0);
    expect(ctx.printHelp).toHaveBeenCalledOnce();
    expect(ctx.createRuntimeConfig).not.toHaveBeenCalled();
    expect(collaborators.cleanRoot).not.toHaveBeenCalled();
  });

  it('cleans the root without loading manifests or validating', async () => {
    const { ctx, collaborators } = createContext({ platform: 'darwin', debianFamily: false });
    await expect(runInvocation(invocation('--clean'), ctx)).resolves.toBe(0);
    expect(collaborators.cleanRoot).toHaveBeenCalledWith('/srv/wrapper');
    expect(ctx.createRuntimeConfig).not.toHaveBeenCalled();
    expect(ctx.loadDeviceCatalog).not.toHaveBeenCalled();
    expect(ctx.probeHost).not.toHaveBeenCalled();
  });

  it('runs a local kernel build with only the kernel fields', async () => {
    const { ctx, collaborators } = createContext();
    await expect(runInvocation(invocation('kernel', 'local', '20.0', 'pixel9'), ctx)).resolves.toBe(0);
    expect(collaborators.buildKernel).toHaveBeenCalledOnce();
    expect(collaborators.buildKernel.mock.calls[0]?.[1]).toEqual({
      codename: 'pixel9',
      losversion: '20.0',
      clean: false,
    });
    expect(collaborators.runInContainer).not.toHaveBeenCalled();
    expect(ctx.probeHost).toHaveBeenCalledOnce();
  });

  it('fails a generic-slim bundle with a Conan upload before any step runs', async () => {
    const { ctx, collaborators } = createContext();
    await expect(
      runInvocation(invocation('bundle', 'docker', '20.0', 'pixel9', 'generic-slim', '--conan-upload'), ctx)
    ).rejects.toThrow(InvalidArgumentCombinationError);
    for (const collaborator of Object.values(collaborators)) {
      expect(collaborator).not.toHaveBeenCalled();
    }
  });

  it('fails an unknown device before any container interaction', async () => {
    const { ctx, collaborators } = createContext();
    await expect(
      runInvocation(invocation('assets', 'podman', '20.0', 'unknownDevice', 'full'), ctx)
    ).rejects.toThrow(UnsupportedDeviceError);
    expect(collaborators.runInContainer).not.toHaveBeenCalled();
  });

  it('hands a container build exactly the allow-listed parameters', async () => {
    const { ctx, collaborators } = createContext();
    await expect(runInvocation(invocation('kernel', 'docker', '20.0', 'pixel9'), ctx)).resolves.toBe(0);
    expect(collaborators.runInContainer).toHaveBeenCalledOnce();
    expect(collaborators.runInContainer.mock.calls[0]?.[1]).toEqual({
      buildenv: 'docker',
      build_module: 'kernel',
      codename: 'pixel9',
      losversion: '20.0',
      clean_image: false,
    });
    expect(collaborators.buildKernel).not.toHaveBeenCalled();
  });

  it('does not probe the host for container builds', async () => {
    const { ctx, collaborators } = createContext({ platform: 'darwin', debianFamily: false });
    await expect(
      runInvocation(invocation('assets', 'podman', '20.0', 'pixel9', 'full'), ctx)
    ).resolves.toBe(0);
    expect(ctx.probeHost).not.toHaveBeenCalled();
    expect(collaborators.runInContainer).toHaveBeenCalledOnce();
  });

  it('refuses local builds on a non-Debian host', async () => {
    const { ctx, collaborators } = createContext({ platform: 'linux', debianFamily: false });
    await expect(
      runInvocation(invocation('kernel', 'local', '20.0', 'pixel9'), ctx)
    ).rejects.toThrow(UnsupportedPlatformError);
    expect(collaborators.buildKernel).not.toHaveBeenCalled();
  });

  it('passes the device descriptor and asset fields to the asset collector', async () => {
    const { ctx, collaborators } = createContext();
    await runInvocation(invocation('assets', 'local', '20.0', 'pixel9', 'minimal', '--rom-only'), ctx);
    const [, device, options] = collaborators.collectAssets.mock.calls[0] ?? [];
    expect(device).toEqual({ name: 'Test Phone 9' });
    expect(options).toEqual({
      codename: 'pixel9',
      losversion: '20.0',
      chroot: 'minimal',
      clean: false,
      romOnly: true,
      extraAssets: undefined,
    });
  });

  it('passes the bundle fields to the bundle creator', async () => {
    const { ctx, collaborators } = createContext();
    await runInvocation(invocation('bundle', 'local', '20.0', 'pixel9', 'conan', '--conan-upload'), ctx);
    expect(collaborators.createBundle.mock.calls[0]?.[2]).toEqual({
      codename: 'pixel9',
      losversion: '20.0',
      packageType: 'conan',
      conanUpload: true,
    });
  });

  it('turns an unsuccessful step into a collaborator failure', async () => {
    const { ctx, collaborators } = createContext();
    collaborators.buildKernel.mockResolvedValue({ success: false, duration: 1, error: 'make exited with code 2' });
    await expect(
      runInvocation(invocation('kernel', 'local', '20.0', 'pixel9'), ctx)
    ).rejects.toThrow(new CollaboratorError('Kernel build failed: make exited with code 2'));
  });

  it('wraps an unexpected exception from a step', async () => {
    const { ctx, collaborators } = createContext();
    collaborators.runInContainer.mockRejectedValue(new Error('socket closed'));
    await expect(
      runInvocation(invocation('kernel', 'podman', '20.0', 'pixel9'), ctx)
    ).rejects.toThrow('Containerized build failed: socket closed');
  });

  it('applies the requested log level after validation', async () => {
    const { ctx } = createContext();
    await runInvocation(invocation('kernel', 'local', '20.0', 'pixel9', '--log-level', 'quiet'), ctx);
    expect(ctx.logger.getLevel()).toBe('quiet');
  });
});
