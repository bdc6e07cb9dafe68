import { DescriptorDefinitionError } from './errors.js';
import type { ArgumentInput, ArgumentSchema } from './types.js';

export function defineArgument(input: ArgumentInput): ArgumentSchema {
	const name = input.name.trim();
	if (name.length === 0) {
		throw new DescriptorDefinitionError('Argument name must not be empty');
	}
	const group = input.group?.trim();
	return Object.freeze({
		name,
		description: input.description,
		required: input.required ?? false,
		...(group ? { group } : {}),
	});
}
