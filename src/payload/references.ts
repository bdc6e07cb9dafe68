import type { PayloadReferences, PayloadStep, ValueSource } from './types.js';

const SHELL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isShellIdentifier(name: string): boolean {
	return SHELL_IDENTIFIER.test(name);
}

function stepValues(step: PayloadStep): ValueSource[] {
	switch (step.kind) {
		case 'announce':
			return [step.message];
		case 'write-file':
			return [step.path, step.content];
		case 'require-file':
		case 'remove-file':
			return [step.path];
		case 'invoke':
			return [...(step.args ?? []), ...Object.values(step.env ?? {})];
		case 'require-env':
		case 'require-command':
		case 'set-default':
		case 'ensure-packages':
			return [];
	}
}

/**
 * Lists every tool argument and environment variable a pipeline reads.
 */
export function collectReferences(steps: readonly PayloadStep[]): PayloadReferences {
	const args = new Set<string>();
	const env = new Set<string>();

	for (const step of steps) {
		if (step.when) {
			args.add('present' in step.when ? step.when.present : step.when.absent);
		}
		if (step.kind === 'set-default') {
			args.add(step.arg);
		}
		if (step.kind === 'require-env') {
			env.add(step.name);
		}
		for (const value of stepValues(step)) {
			if (typeof value === 'string') continue;
			if ('arg' in value) {
				args.add(value.arg);
			} else {
				env.add(value.env);
			}
		}
	}

	return { args: [...args], env: [...env] };
}
