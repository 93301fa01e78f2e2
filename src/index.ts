/**
 * Kernel Wrapper - Index
 * Export main modules
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './env.js';
export * from './logger.js';
export * from './exec.js';
export * from './fileops.js';
export * from './validation.js';
export * from './projector.js';
export * from './args.js';
export * from './dispatcher.js';
export * from './steps/index.js';
