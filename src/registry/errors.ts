export class DuplicateToolError extends Error {
	readonly namespace: string;
	readonly toolName: string;

	constructor(namespace: string, toolName: string) {
		super(`Tool "${toolName}" is already registered in namespace "${namespace}"`);
		this.name = 'DuplicateToolError';
		this.namespace = namespace;
		this.toolName = toolName;
	}
}

export class RegistryUnavailableError extends Error {
	constructor(reason = 'Tool registry is not accepting registrations') {
		super(reason);
		this.name = 'RegistryUnavailableError';
	}
}
