import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { getDefaultConfigPath } from './defaults.js';
import { ConfigSchema, type RunnerConfig } from './schema.js';

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Resolves ${ENV_VAR} references in string values. Unset variables become ''.
 */
function resolveEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			return process.env[varName] ?? '';
		});
	}
	if (Array.isArray(value)) {
		return value.map(resolveEnvVars);
	}
	if (isRecord(value)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(value)) {
			result[key] = resolveEnvVars(val);
		}
		return result;
	}
	return value;
}

function snakeToCamel(str: string): string {
	return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

// Keys below these sections are user data (variable names, file paths) and keep their spelling.
const VERBATIM_SECTIONS = new Set(['env', 'files']);

function convertKeysToCamelCase(obj: unknown): unknown {
	if (Array.isArray(obj)) {
		return obj.map(convertKeysToCamelCase);
	}
	if (isRecord(obj)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(obj)) {
			const camelKey = snakeToCamel(key);
			result[camelKey] = VERBATIM_SECTIONS.has(camelKey) ? val : convertKeysToCamelCase(val);
		}
		return result;
	}
	return obj;
}

/**
 * Loads and validates the runner configuration.
 * A missing file yields the defaults.
 */
export function loadConfig(configPath?: string): Result<RunnerConfig> {
	const path = configPath ?? getDefaultConfigPath();

	let rawConfig: Record<string, unknown> = {};

	if (existsSync(path)) {
		try {
			const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
			if (isRecord(parsed)) {
				rawConfig = parsed;
			}
		} catch (err) {
			return {
				ok: false,
				error: new Error(
					`Failed to parse config at ${path}: ${err instanceof Error ? err.message : String(err)}`,
				),
			};
		}
	}

	const resolvedConfig = resolveEnvVars(convertKeysToCamelCase(rawConfig));
	const result = ConfigSchema.safeParse(resolvedConfig);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
		);
		return {
			ok: false,
			error: new Error(`Invalid configuration:\n${issues.join('\n')}`),
		};
	}

	return { ok: true, value: result.data };
}

let _config: RunnerConfig | null = null;

/**
 * Initializes and returns the config. Call once at startup.
 */
export function initConfig(configPath?: string): Result<RunnerConfig> {
	const result = loadConfig(configPath);
	if (result.ok) {
		_config = result.value;
	}
	return result;
}

/**
 * Gets the loaded config. Throws if not initialized.
 */
export function getConfig(): RunnerConfig {
	if (_config === null) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return _config;
}

/**
 * Resets config (for testing).
 */
export function resetConfig(): void {
	_config = null;
}
