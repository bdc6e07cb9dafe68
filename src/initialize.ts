import type { RunnerConfig } from './config/schema.js';
import type { ToolDescriptor } from './descriptor/types.js';
import { createToolSet, type ToolSet } from './registry/toolset.js';
import type { RegistrationReport, ToolRegistry } from './registry/types.js';
import { createLogger } from './utils/logger.js';
import { loadCatalog } from './variants/catalog.js';
import { buildDescriptors } from './variants/factory.js';

const logger = createLogger('initialize');

export interface InitializeOptions {
	config: RunnerConfig;
	/** When omitted the tool sets are built but nothing is registered. */
	registry?: ToolRegistry;
	/** Overrides `config.catalog.path` and the bundled catalog. */
	catalogPath?: string;
}

export interface InitializeResult {
	toolSets: ToolSet[];
	descriptors: ToolDescriptor[];
	reports: RegistrationReport[];
}

/**
 * Builds one tool set per catalog family and registers them in family order.
 * Families whose tools are all filtered out produce no tool set.
 */
export function initialize(options: InitializeOptions): InitializeResult {
	const { config } = options;
	const catalog = loadCatalog(options.catalogPath ?? config.catalog.path);
	const descriptors = buildDescriptors(catalog, {
		commonEnv: config.common.env,
		commonFiles: config.common.files,
		includeDeprecated: config.catalog.includeDeprecated,
	});

	const toolSets: ToolSet[] = [];
	for (const family of catalog.families) {
		const members = descriptors.filter((descriptor) => descriptor.metadata.family === family.name);
		if (members.length === 0) continue;
		toolSets.push(
			createToolSet({
				name: family.name,
				namespace: config.registry.namespace,
				descriptors: members,
				policy: config.registry.policy,
			}),
		);
	}

	const reports: RegistrationReport[] = [];
	const { registry } = options;
	if (registry) {
		for (const toolSet of toolSets) {
			reports.push(toolSet.registerAll(registry));
		}
	}

	logger.info('Tools initialized', {
		namespace: config.registry.namespace,
		toolSets: toolSets.length,
		tools: descriptors.length,
		registered: reports.reduce((total, report) => total + report.registered.length, 0),
	});

	return { toolSets, descriptors, reports };
}
