import { createToolDescriptor } from '../descriptor/descriptor.js';
import type { ToolDescriptor } from '../descriptor/types.js';
import { createLogger } from '../utils/logger.js';
import type { FamilyRecord, ToolCatalog, ToolRecord } from './schema.js';

const logger = createLogger('variants');

export interface BuildDescriptorsOptions {
	/** Environment variables every tool receives; a family's own values win. */
	commonEnv?: Record<string, string>;
	/** Files mounted into every tool; a family's own files win. */
	commonFiles?: Record<string, string>;
	includeDeprecated?: boolean;
}

function buildDescriptor(
	family: FamilyRecord,
	tool: ToolRecord,
	options: BuildDescriptorsOptions,
): ToolDescriptor {
	return createToolDescriptor({
		name: tool.name,
		description: tool.description,
		arguments: tool.arguments,
		steps: [...family.prelude, ...tool.steps],
		environment: family.environment,
		iconUrl: family.iconUrl,
		family: family.name,
		deprecated: tool.deprecated,
		auxiliaryResources: { ...options.commonFiles, ...family.files },
		environmentVariables: { ...options.commonEnv, ...family.env },
		secrets: family.secrets,
	});
}

/**
 * Turns catalog records into descriptors, in catalog order. Every tool takes
 * the image, icon, secrets and prelude of its family.
 */
export function buildDescriptors(
	catalog: ToolCatalog,
	options: BuildDescriptorsOptions = {},
): ToolDescriptor[] {
	const families = new Map(catalog.families.map((family) => [family.name, family]));
	const descriptors: ToolDescriptor[] = [];

	for (const tool of catalog.tools) {
		if (tool.deprecated && !options.includeDeprecated) {
			logger.debug('Skipping deprecated tool', { name: tool.name, family: tool.family });
			continue;
		}
		const family = families.get(tool.family);
		if (!family) {
			throw new Error(`Tool "${tool.name}" names unknown family "${tool.family}"`);
		}
		descriptors.push(buildDescriptor(family, tool, options));
	}

	return descriptors;
}
