export { defineArgument } from './argument.js';
export { createToolDescriptor } from './descriptor.js';
export { DescriptorDefinitionError } from './errors.js';
export type {
	ArgumentInput,
	ArgumentSchema,
	DescriptorMetadata,
	ToolDescriptor,
	ToolDescriptorDefinition,
	ToolManifest,
} from './types.js';
export {
	findMissingArguments,
	formatMissingArguments,
	hasMissingArguments,
	isPresent,
	type MissingArguments,
} from './validation.js';
