import type { ArgumentSchema } from './types.js';

export interface MissingArguments {
	/** Required argument names, in declared order. */
	required: string[];
	/** Unsatisfied either-of groups, each listing its members in declared order. */
	groups: string[][];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * A supplied value counts only when it is truthy: missing keys, null, false,
 * zero, NaN, empty strings, empty arrays and empty plain objects are all absent.
 */
export function isPresent(value: unknown): boolean {
	if (value === undefined || value === null || value === false) return false;
	if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
	if (typeof value === 'bigint') return value !== 0n;
	if (typeof value === 'string') return value.length > 0;
	if (Array.isArray(value)) return value.length > 0;
	if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
		return Object.keys(value).length > 0;
	}
	return true;
}

export function readArgument(args: unknown, name: string): unknown {
	if (!isRecord(args) || !Object.hasOwn(args, name)) return undefined;
	return args[name];
}

export function findMissingArguments(
	schema: readonly ArgumentSchema[],
	args: unknown,
): MissingArguments {
	const required: string[] = [];
	const groups = new Map<string, { members: string[]; satisfied: boolean }>();

	for (const argument of schema) {
		const present = isPresent(readArgument(args, argument.name));
		if (argument.required && !present && !required.includes(argument.name)) {
			required.push(argument.name);
		}
		if (argument.group) {
			const group = groups.get(argument.group) ?? { members: [], satisfied: false };
			group.members.push(argument.name);
			group.satisfied ||= present;
			groups.set(argument.group, group);
		}
	}

	return {
		required,
		groups: [...groups.values()].filter((group) => !group.satisfied).map((group) => group.members),
	};
}

export function hasMissingArguments(missing: MissingArguments): boolean {
	return missing.required.length > 0 || missing.groups.length > 0;
}

export function formatMissingArguments(missing: MissingArguments): string | null {
	const parts: string[] = [];
	if (missing.required.length > 0) {
		parts.push(`Missing required arguments: ${missing.required.join(', ')}`);
	}
	for (const members of missing.groups) {
		parts.push(`${parts.length === 0 ? 'Missing' : 'missing'} one of: ${members.join(', ')}`);
	}
	return parts.length > 0 ? parts.join('; ') : null;
}
