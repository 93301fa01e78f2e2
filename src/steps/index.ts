/**
 * Kernel Wrapper - Steps Index
 */

export * from './kernel.js';
export * from './assets.js';
export * from './bundle.js';
export * from './container.js';
export * from './clean.js';
