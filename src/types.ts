/**
 * Kernel Wrapper - Types
 *
 * Inputs read from the root path:
 *   - manifests/devices.json - Supported devices keyed by codename
 *   - manifests/info.json    - Product name and version
 *   - config/wrapper.yaml    - Container and build command settings
 */

export const BUILD_COMMANDS = ['kernel', 'assets', 'bundle'] as const;
export const BUILD_ENVS = ['local', 'docker', 'podman'] as const;
export const CONTAINER_ENGINES = ['docker', 'podman'] as const;
export const LOG_LEVELS = ['normal', 'verbose', 'quiet'] as const;
export const CHROOT_TYPES = ['full', 'minimal'] as const;
export const PACKAGE_TYPES = ['conan', 'generic-slim'] as const;

export type BuildCommand = (typeof BUILD_COMMANDS)[number];
export type BuildEnv = (typeof BUILD_ENVS)[number];
export type ContainerEngineName = (typeof CONTAINER_ENGINES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];
export type ChrootType = (typeof CHROOT_TYPES)[number];
export type PackageType = (typeof PACKAGE_TYPES)[number];

// Fields shared by every build command
interface RequestBase {
  readonly buildenv: BuildEnv;
  readonly losversion: string;
  readonly codename: string;
  readonly cleanImage: boolean;
  readonly logLevel: LogLevel;
  readonly outputLog?: string;
}

export interface KernelRequest extends RequestBase {
  readonly command: 'kernel';
  readonly clean: boolean;
}

export interface AssetsRequest extends RequestBase {
  readonly command: 'assets';
  readonly chroot: ChrootType;
  readonly extraAssets?: string;
  readonly romOnly: boolean;
  readonly clean: boolean;
}

export interface BundleRequest extends RequestBase {
  readonly command: 'bundle';
  readonly packageType: PackageType;
  readonly conanUpload: boolean;
}

export type BuildRequest = KernelRequest | AssetsRequest | BundleRequest;

// Parsed command line
export type Invocation =
  | { readonly kind: 'help' }
  | { readonly kind: 'clean' }
  | { readonly kind: 'build'; readonly request: BuildRequest };

export interface ProductMetadata {
  readonly name: string;
  readonly version: string;
}

export interface DeviceDescriptor {
  readonly name: string;
  readonly vendor?: string;
  // ROM download URL per LineageOS version
  readonly rom?: Readonly<Record<string, string>>;
}

// Facts about the host, gathered by a probe rather than by failing commands
export interface HostFacts {
  readonly platform: NodeJS.Platform;
  readonly debianFamily: boolean;
}

// config/wrapper.yaml
export interface WrapperSettings {
  readonly container: {
    readonly image: string;
    readonly workdir: string;
    readonly entry: readonly string[];
  };
  readonly kernel: {
    readonly command: readonly string[];
  };
  readonly assets: {
    readonly chroot: Readonly<Record<ChrootType, string>>;
  };
  readonly conan: {
    readonly create: readonly string[];
    readonly upload: readonly string[];
  };
}

// Immutable settings for one run, passed to every step
export interface RuntimeConfig {
  readonly rootPath: string;
  readonly logLevel: LogLevel;
  readonly product: ProductMetadata;
  readonly outputLog?: string;
  readonly settings: WrapperSettings;
}

// Build step result
export interface BuildStepResult {
  success: boolean;
  duration: number; // in milliseconds
  output?: string;
  error?: string;
}

// Command execution options
export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  stdio?: 'inherit' | 'pipe' | 'ignore';
}
