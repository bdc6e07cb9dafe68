export { DuplicateToolError, RegistryUnavailableError } from './errors.js';
export { createToolRegistry, type InMemoryToolRegistry } from './memory-registry.js';
export { type CreateToolSetOptions, createToolSet, type ToolSet } from './toolset.js';
export type { RegistrationFailure, RegistrationReport, ToolRegistry } from './types.js';
