/**
 * Kernel Wrapper - Configuration Loader
 * Reads the manifests and settings found under the root path:
 *   - manifests/info.json    - Product name and version
 *   - manifests/devices.json - Supported devices keyed by codename
 *   - config/wrapper.yaml    - Container and build command settings
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, ManifestLoadError } from './errors.js';
import type { DeviceDescriptor, ProductMetadata, WrapperSettings } from './types.js';

const productSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const deviceSchema = z.object({
  name: z.string(),
  vendor: z.string().optional(),
  rom: z.record(z.string(), z.string().url()).optional(),
});

const devicesSchema = z.record(z.string(), deviceSchema);

const commandSchema = z.array(z.string()).min(1);

const settingsSchema = z.object({
  container: z.object({
    image: z.string().min(1),
    workdir: z.string().startsWith('/'),
    entry: commandSchema,
  }),
  kernel: z.object({
    command: commandSchema,
  }),
  assets: z.object({
    chroot: z.object({
      full: z.string().url(),
      minimal: z.string().url(),
    }),
  }),
  conan: z.object({
    create: commandSchema,
    upload: commandSchema,
  }),
});

export function getManifestPath(rootPath: string, name: 'info' | 'devices'): string {
  return join(rootPath, 'manifests', `${name}.json`);
}

export function getSettingsPath(rootPath: string): string {
  return join(rootPath, 'config', 'wrapper.yaml');
}

async function readManifest(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ManifestLoadError(`Unable to read manifest ${path}`, { cause: err });
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ManifestLoadError(`Manifest ${path} is not valid JSON`, { cause: err });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load product name and version from manifests/info.json
 */
export async function loadProductMetadata(rootPath: string): Promise<ProductMetadata> {
  const path = getManifestPath(rootPath, 'info');
  const parsed = productSchema.safeParse(await readManifest(path));
  if (!parsed.success) {
    throw new ManifestLoadError(`Invalid product manifest ${path}: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

/**
 * Supported devices, read once from manifests/devices.json
 */
export class DeviceCatalog {
  private readonly devices: ReadonlyMap<string, DeviceDescriptor>;

  constructor(devices: Readonly<Record<string, DeviceDescriptor>>) {
    this.devices = new Map(Object.entries(devices));
  }

  has(codename: string): boolean {
    return this.devices.has(codename);
  }

  get(codename: string): DeviceDescriptor | undefined {
    return this.devices.get(codename);
  }

  codenames(): string[] {
    return [...this.devices.keys()];
  }
}

export async function loadDeviceCatalog(rootPath: string): Promise<DeviceCatalog> {
  const path = getManifestPath(rootPath, 'devices');
  const parsed = devicesSchema.safeParse(await readManifest(path));
  if (!parsed.success) {
    throw new ManifestLoadError(`Invalid devices manifest ${path}: ${describeIssues(parsed.error)}`);
  }
  return new DeviceCatalog(parsed.data);
}

/**
 * Load config/wrapper.yaml
 */
export async function loadWrapperSettings(rootPath: string): Promise<WrapperSettings> {
  const path = getSettingsPath(rootPath);
  let document: unknown;
  try {
    document = parseYaml(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Unable to load settings from ${path}`, { cause: err });
  }
  const parsed = settingsSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings in ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

const extraAssetsSchema = z.array(z.string().min(1));

/**
 * Load the list of extra assets: URLs to download or paths to copy
 */
export async function loadExtraAssets(path: string): Promise<string[]> {
  const parsed = extraAssetsSchema.safeParse(await readManifest(path));
  if (!parsed.success) {
    throw new ManifestLoadError(`Invalid extra assets list ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
