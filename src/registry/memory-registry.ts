import type { ToolDescriptor } from '../descriptor/types.js';
import { createLogger } from '../utils/logger.js';
import { DuplicateToolError, RegistryUnavailableError } from './errors.js';
import type { ToolRegistry } from './types.js';

const logger = createLogger('registry');

export interface InMemoryToolRegistry extends ToolRegistry {
	get(namespace: string, name: string): ToolDescriptor | undefined;
	list(namespace: string): ToolDescriptor[];
	namespaces(): string[];
	close(): void;
}

/**
 * In-process registry keyed by namespace then tool name. Keeps the first
 * descriptor registered under a name.
 */
export function createToolRegistry(): InMemoryToolRegistry {
	const namespaces = new Map<string, Map<string, ToolDescriptor>>();
	let closed = false;

	function register(namespace: string, descriptor: ToolDescriptor): void {
		if (closed) {
			throw new RegistryUnavailableError('Tool registry is closed');
		}
		const tools = namespaces.get(namespace) ?? new Map<string, ToolDescriptor>();
		if (tools.has(descriptor.name)) {
			throw new DuplicateToolError(namespace, descriptor.name);
		}
		tools.set(descriptor.name, descriptor);
		namespaces.set(namespace, tools);
		logger.debug('Tool stored', { namespace, name: descriptor.name });
	}

	return {
		register,
		get: (namespace, name) => namespaces.get(namespace)?.get(name),
		list: (namespace) => [...(namespaces.get(namespace)?.values() ?? [])],
		namespaces: () => [...namespaces.keys()],
		close() {
			closed = true;
		},
	};
}
