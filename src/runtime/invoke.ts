import { v4 as uuidv4 } from 'uuid';
import type { ToolDescriptor } from '../descriptor/types.js';
import { isPresent, readArgument } from '../descriptor/validation.js';
import { createLogger } from '../utils/logger.js';
import { redactKnownValues, redactSecrets } from '../utils/secret-redaction.js';
import type { InvocationResult, ScriptLauncher } from './types.js';

const logger = createLogger('runtime');

const DEFAULT_TIMEOUT_MS = 600_000;

export interface InvokeToolOptions {
	launcher: ScriptLauncher;
	/** Secrets and other values the host provides to the tool. */
	env?: Record<string, string>;
	timeoutMs?: number;
	cwd?: string;
}

function stringifyArgument(value: unknown): string {
	if (!isPresent(value)) return '';
	if (typeof value === 'string') return value;
	if (typeof value === 'object') return JSON.stringify(value);
	return String(value);
}

/**
 * The variables a payload sees: the descriptor's own environment, host values,
 * then one variable per declared argument. Arguments the caller left out are
 * set to '' so stale values from the host never leak in.
 */
export function buildInvocationEnv(
	descriptor: ToolDescriptor,
	args: unknown,
	hostEnv: Record<string, string> = {},
): Record<string, string> {
	const env: Record<string, string> = { ...descriptor.environmentVariables, ...hostEnv };
	for (const argument of descriptor.arguments) {
		env[argument.name] = stringifyArgument(readArgument(args, argument.name));
	}
	return env;
}

function redactOutput(text: string, secretValues: readonly string[]): string {
	return redactSecrets(redactKnownValues(text, secretValues));
}

/**
 * Runs a tool locally. Invalid calls are answered with the missing-argument
 * message and never reach the launcher.
 */
export async function invokeTool(
	descriptor: ToolDescriptor,
	args: unknown,
	options: InvokeToolOptions,
): Promise<InvocationResult> {
	const message = descriptor.describeMissing(args);
	if (message !== null) {
		logger.warn('Tool call rejected', { tool: descriptor.name, reason: message });
		return { status: 'invalid', tool: descriptor.name, message };
	}

	const runId = uuidv4();
	const env = buildInvocationEnv(descriptor, args, options.env);
	const secretValues = descriptor.secrets
		.map((name) => env[name] ?? process.env[name] ?? '')
		.filter((value) => value.length > 0);
	const startTime = Date.now();

	logger.info('Running tool', { tool: descriptor.name, runId });
	const result = await options.launcher.launch({
		script: descriptor.payload,
		env,
		timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		cwd: options.cwd,
	});
	const durationMs = Date.now() - startTime;

	logger.info('Tool finished', {
		tool: descriptor.name,
		runId,
		exitCode: result.exitCode,
		durationMs,
	});

	return {
		status: result.exitCode === 0 ? 'succeeded' : 'failed',
		tool: descriptor.name,
		runId,
		exitCode: result.exitCode,
		stdout: redactOutput(result.stdout, secretValues),
		stderr: redactOutput(result.stderr, secretValues),
		durationMs,
	};
}
