import type { PayloadStep } from '../payload/types.js';

/** One declared input of a tool. */
export interface ArgumentSchema {
	readonly name: string;
	readonly description: string;
	readonly required: boolean;
	/**
	 * Either-of group tag. A call must supply at least one argument of every
	 * group that has members on the descriptor.
	 */
	readonly group?: string;
}

export interface ArgumentInput {
	name: string;
	description: string;
	required?: boolean;
	group?: string;
}

export interface DescriptorMetadata {
	readonly type: 'docker';
	readonly family?: string;
	readonly deprecated: boolean;
}

export interface ToolDescriptorDefinition {
	name: string;
	description: string;
	arguments?: ArgumentInput[];
	steps: PayloadStep[];
	environment: string;
	iconUrl?: string;
	family?: string;
	deprecated?: boolean;
	auxiliaryResources?: Record<string, string>;
	environmentVariables?: Record<string, string>;
	secrets?: string[];
}

/** Plain serializable view of a descriptor, as handed to a host registry. */
export interface ToolManifest {
	name: string;
	description: string;
	arguments: ArgumentSchema[];
	payload: string;
	environment: string;
	iconUrl: string | null;
	metadata: DescriptorMetadata;
	auxiliaryResources: Record<string, string>;
	environmentVariables: Record<string, string>;
	secrets: string[];
}

export interface ToolDescriptor {
	readonly name: string;
	readonly description: string;
	readonly arguments: readonly ArgumentSchema[];
	readonly steps: readonly PayloadStep[];
	readonly payload: string;
	readonly environment: string;
	readonly iconUrl: string | null;
	readonly metadata: DescriptorMetadata;
	readonly auxiliaryResources: Readonly<Record<string, string>>;
	readonly environmentVariables: Readonly<Record<string, string>>;
	readonly secrets: readonly string[];
	/** True when every required argument and every either-of group is satisfied. */
	validate(args: unknown): boolean;
	/** Null exactly when `validate(args)` is true. */
	describeMissing(args: unknown): string | null;
	getArguments(): readonly ArgumentSchema[];
	getPayload(): string;
	getEnvironment(): string;
	toManifest(): ToolManifest;
}
