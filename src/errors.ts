/**
 * Kernel Wrapper - Errors
 *
 * Every failure the wrapper reports is a WrapperError. The CLI entry point
 * prints the message once and exits non-zero.
 */

export type ErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'UNSUPPORTED_DEVICE'
  | 'INVALID_ARGUMENT_COMBINATION'
  | 'MANIFEST_LOAD_FAILURE'
  | 'CONFIG_INVALID'
  | 'TRANSFER_FAILURE'
  | 'COLLABORATOR_FAILURE'
  | 'OUTPUT_STREAM_FAILURE';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

export interface WrapperErrorOptions {
  readonly cause?: unknown;
  readonly details?: ErrorDetails;
}

export class WrapperError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, options: WrapperErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    if (options.details !== undefined) {
      this.details = options.details;
    }
    this.name = this.constructor.name;
  }
}

/** Local build requested on a non-Linux or non-Debian host */
export class UnsupportedPlatformError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('UNSUPPORTED_PLATFORM', message, options);
  }
}

/** Codename absent from the device manifest */
export class UnsupportedDeviceError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('UNSUPPORTED_DEVICE', message, options);
  }
}

/** Flags that only apply to another package type */
export class InvalidArgumentCombinationError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('INVALID_ARGUMENT_COMBINATION', message, options);
  }
}

export class ManifestLoadError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('MANIFEST_LOAD_FAILURE', message, options);
  }
}

export class ConfigError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('CONFIG_INVALID', message, options);
  }
}

/** Download or copy failed */
export class TransferError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('TRANSFER_FAILURE', message, options);
  }
}

/** Opaque failure of the kernel, asset, bundle or container steps */
export class CollaboratorError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('COLLABORATOR_FAILURE', message, options);
  }
}

export class OutputStreamError extends WrapperError {
  constructor(message: string, options?: WrapperErrorOptions) {
    super('OUTPUT_STREAM_FAILURE', message, options);
  }
}

export function isWrapperError(error: unknown): error is WrapperError {
  return error instanceof WrapperError;
}

/**
 * Format an arbitrary error into a single line for the error report.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
