import type { ToolDescriptor } from '../descriptor/types.js';

/**
 * The host framework's tool store. `register` throws `DuplicateToolError` when
 * the namespace already holds a tool of the same name, and
 * `RegistryUnavailableError` when the registry cannot take registrations.
 */
export interface ToolRegistry {
	register(namespace: string, descriptor: ToolDescriptor): void;
}

export interface RegistrationFailure {
	name: string;
	error: string;
}

export interface RegistrationReport {
	toolSet: string;
	namespace: string;
	registered: string[];
	failed: RegistrationFailure[];
}
