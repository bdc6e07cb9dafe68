import { InvalidArgumentError } from 'commander';
import type { SandboxBackend } from '../sandbox/types.js';

export function writeError(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	process.stderr.write(`Error: ${message}\n`);
}

/** Commander parser for repeatable `-a key=value` options. */
export function collectArgument(
	value: string,
	previous: Record<string, string> = {},
): Record<string, string> {
	const separator = value.indexOf('=');
	if (separator <= 0) {
		throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
	}
	return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

export function parseBackend(value: string): SandboxBackend {
	if (value === 'rest' || value === 'sdk') return value;
	throw new InvalidArgumentError('Backend must be "rest" or "sdk"');
}

export function parseTimeout(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Timeout must be a positive number of milliseconds');
	}
	return parsed;
}
