export * from './config/index.js';
export * from './descriptor/index.js';
export { type InitializeOptions, type InitializeResult, initialize } from './initialize.js';
export * from './payload/index.js';
export * from './registry/index.js';
export * from './runtime/index.js';
export * from './sandbox/index.js';
export * from './utils/index.js';
export * from './variants/index.js';
