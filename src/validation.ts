/**
 * Kernel Wrapper - Settings Validation
 *
 * Checks run in a fixed order and the first failure wins:
 * host platform (local builds only), device codename, command flags.
 * A passing result carries the device descriptor of the codename.
 */

import type { DeviceCatalog } from './config.js';
import {
  InvalidArgumentCombinationError,
  UnsupportedDeviceError,
  UnsupportedPlatformError,
  type WrapperError,
} from './errors.js';
import type { BuildRequest, DeviceDescriptor, HostFacts } from './types.js';

export type ValidationResult =
  | { readonly ok: true; readonly device: DeviceDescriptor }
  | { readonly ok: false; readonly error: WrapperError };

function fail(error: WrapperError): ValidationResult {
  return { ok: false, error };
}

/**
 * Host facts are only read for local builds. A local build without them
 * fails the platform check.
 */
export function validateSettings(
  request: BuildRequest,
  catalog: DeviceCatalog,
  host: HostFacts | null
): ValidationResult {
  if (request.buildenv === 'local') {
    if (host === null || host.platform !== 'linux') {
      return fail(new UnsupportedPlatformError("Can't build kernel on a non-Linux machine."));
    }
    if (!host.debianFamily) {
      return fail(
        new UnsupportedPlatformError(
          'Detected Linux distribution is not Debian-based, unable to launch.'
        )
      );
    }
  }

  const device = catalog.get(request.codename);
  if (device === undefined) {
    return fail(
      new UnsupportedDeviceError('Unsupported device codename specified.', {
        details: { codename: request.codename },
      })
    );
  }

  if (request.command === 'bundle' && request.packageType !== 'conan' && request.conanUpload) {
    return fail(
      new InvalidArgumentCombinationError(
        'Cannot use Conan-related arguments with non-Conan packaging',
        { details: { packageType: request.packageType } }
      )
    );
  }

  return { ok: true, device };
}
