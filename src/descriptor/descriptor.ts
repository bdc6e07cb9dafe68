import { collectReferences, isShellIdentifier } from '../payload/references.js';
import { renderPayload } from '../payload/render.js';
import type { PayloadStep } from '../payload/types.js';
import { defineArgument } from './argument.js';
import { DescriptorDefinitionError } from './errors.js';
import type {
	ArgumentSchema,
	DescriptorMetadata,
	ToolDescriptor,
	ToolDescriptorDefinition,
	ToolManifest,
} from './types.js';
import {
	findMissingArguments,
	formatMissingArguments,
	hasMissingArguments,
} from './validation.js';

/** Variables every container shell provides without being declared. */
const AMBIENT_ENVIRONMENT = new Set(['HOME', 'PATH', 'PWD', 'TMPDIR', 'USER']);

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
		for (const item of Object.values(value)) {
			deepFreeze(item);
		}
		Object.freeze(value);
	}
	return value;
}

function buildArguments(definition: ToolDescriptorDefinition): ArgumentSchema[] {
	const seen = new Set<string>();
	return (definition.arguments ?? []).map((input) => {
		const argument = defineArgument(input);
		if (seen.has(argument.name)) {
			throw new DescriptorDefinitionError(
				`argument "${argument.name}" is declared twice`,
				definition.name,
			);
		}
		seen.add(argument.name);
		return argument;
	});
}

function checkReferences(
	definition: ToolDescriptorDefinition,
	argumentNames: ReadonlySet<string>,
	steps: readonly PayloadStep[],
): void {
	const references = collectReferences(steps);
	const knownEnvironment = new Set([
		...AMBIENT_ENVIRONMENT,
		...(definition.secrets ?? []),
		...Object.keys(definition.environmentVariables ?? {}),
	]);

	const invalid = [...references.args, ...references.env].filter((name) => !isShellIdentifier(name));
	if (invalid.length > 0) {
		throw new DescriptorDefinitionError(
			`payload references names that are not shell identifiers: ${invalid.join(', ')}`,
			definition.name,
		);
	}

	const undeclaredArgs = references.args.filter((name) => !argumentNames.has(name));
	if (undeclaredArgs.length > 0) {
		throw new DescriptorDefinitionError(
			`payload references undeclared arguments: ${undeclaredArgs.join(', ')}`,
			definition.name,
		);
	}

	const undeclaredEnv = references.env.filter((name) => !knownEnvironment.has(name));
	if (undeclaredEnv.length > 0) {
		throw new DescriptorDefinitionError(
			`payload reads environment values that are neither secrets nor variables: ${undeclaredEnv.join(', ')}`,
			definition.name,
		);
	}
}

/**
 * Builds an immutable tool descriptor. The payload is rendered once here; the
 * declared arguments stay the only input to validation.
 */
export function createToolDescriptor(definition: ToolDescriptorDefinition): ToolDescriptor {
	const name = definition.name.trim();
	if (name.length === 0) {
		throw new DescriptorDefinitionError('Tool name must not be empty');
	}
	if (definition.description.trim().length === 0) {
		throw new DescriptorDefinitionError('description must not be empty', name);
	}
	if (definition.environment.trim().length === 0) {
		throw new DescriptorDefinitionError('environment must not be empty', name);
	}

	const args = Object.freeze(buildArguments({ ...definition, name }));
	const steps = deepFreeze(structuredClone(definition.steps));
	checkReferences({ ...definition, name }, new Set(args.map((arg) => arg.name)), steps);

	const payload = renderPayload(steps);
	const secrets = Object.freeze([...new Set(definition.secrets ?? [])]);
	const auxiliaryResources = Object.freeze({ ...definition.auxiliaryResources });
	const environmentVariables = Object.freeze({ ...definition.environmentVariables });
	const metadata: DescriptorMetadata = Object.freeze({
		type: 'docker' as const,
		deprecated: definition.deprecated ?? false,
		...(definition.family ? { family: definition.family } : {}),
	});
	const iconUrl = definition.iconUrl ?? null;

	function validate(input: unknown): boolean {
		return !hasMissingArguments(findMissingArguments(args, input));
	}

	function describeMissing(input: unknown): string | null {
		return formatMissingArguments(findMissingArguments(args, input));
	}

	function toManifest(): ToolManifest {
		return {
			name,
			description: definition.description,
			arguments: args.map((arg) => ({ ...arg })),
			payload,
			environment: definition.environment,
			iconUrl,
			metadata: { ...metadata },
			auxiliaryResources: { ...auxiliaryResources },
			environmentVariables: { ...environmentVariables },
			secrets: [...secrets],
		};
	}

	return Object.freeze({
		name,
		description: definition.description,
		arguments: args,
		steps,
		payload,
		environment: definition.environment,
		iconUrl,
		metadata,
		auxiliaryResources,
		environmentVariables,
		secrets,
		validate,
		describeMissing,
		getArguments: () => args,
		getPayload: () => payload,
		getEnvironment: () => definition.environment,
		toManifest,
	});
}
