import type { RegistrationPolicy } from '../config/schema.js';
import type { ToolDescriptor } from '../descriptor/types.js';
import { createLogger } from '../utils/logger.js';
import type { RegistrationReport, ToolRegistry } from './types.js';

const logger = createLogger('registry:toolset');

export interface CreateToolSetOptions {
	name: string;
	namespace: string;
	descriptors: readonly ToolDescriptor[];
	/** Defaults to 'fail-fast'. */
	policy?: RegistrationPolicy;
}

export interface ToolSet {
	readonly name: string;
	readonly namespace: string;
	readonly descriptors: readonly ToolDescriptor[];
	/** Registers every descriptor with `registry` under the set's namespace. */
	registerAll(registry: ToolRegistry): RegistrationReport;
}

/**
 * Groups the descriptors of one family for registration. Under 'fail-fast' the
 * first rejected descriptor aborts the batch and its error propagates; under
 * 'best-effort' every descriptor is attempted and failures are reported.
 */
export function createToolSet(options: CreateToolSetOptions): ToolSet {
	const policy = options.policy ?? 'fail-fast';
	const descriptors = Object.freeze([...options.descriptors]);

	function registerAll(registry: ToolRegistry): RegistrationReport {
		const report: RegistrationReport = {
			toolSet: options.name,
			namespace: options.namespace,
			registered: [],
			failed: [],
		};

		for (const descriptor of descriptors) {
			try {
				registry.register(options.namespace, descriptor);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				logger.error('Failed to register tool', {
					toolSet: options.name,
					name: descriptor.name,
					error: message,
				});
				if (policy === 'fail-fast') {
					throw error;
				}
				report.failed.push({ name: descriptor.name, error: message });
				continue;
			}
			report.registered.push(descriptor.name);
			logger.info('Registered tool', { toolSet: options.name, name: descriptor.name });
		}

		return report;
	}

	return {
		name: options.name,
		namespace: options.namespace,
		descriptors,
		registerAll,
	};
}
