import { tmpdir } from 'node:os';
import { z } from 'zod';

const RegistrySchema = z.object({
	namespace: z.string().min(1).default('python_script_runner'),
	policy: z.enum(['fail-fast', 'best-effort']).default('fail-fast'),
});

const CatalogSchema = z.object({
	path: z.string().optional(),
	includeDeprecated: z.boolean().default(false),
});

const CommonResourcesSchema = z.object({
	env: z.record(z.string()).default({}),
	files: z.record(z.string()).default({}),
});

const SandboxSchema = z.object({
	backend: z.enum(['rest', 'sdk']).default('sdk'),
	apiBaseUrl: z.string().url().default('https://codesandbox.io/api/v1'),
	sandboxUrlBase: z.string().url().default('https://codesandbox.io/s'),
	sessionDir: z.string().default(tmpdir()),
	template: z.string().default('python'),
	privacy: z.enum(['public', 'unlisted', 'private']).default('unlisted'),
	hibernationTimeoutSeconds: z.number().int().positive().default(1800),
	requestTimeoutMs: z.number().int().positive().default(30_000),
	installTimeoutMs: z.number().int().positive().default(120_000),
	executionTimeoutMs: z.number().int().positive().default(300_000),
});

const RuntimeSchema = z.object({
	timeoutMs: z.number().int().positive().default(600_000),
});

const LoggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	file: z.string().default('~/.script-runner/logs/script-runner.log'),
});

export const ConfigSchema = z.object({
	version: z.number().int().default(1),
	registry: RegistrySchema.default({}),
	catalog: CatalogSchema.default({}),
	common: CommonResourcesSchema.default({}),
	sandbox: SandboxSchema.default({}),
	runtime: RuntimeSchema.default({}),
	logging: LoggingSchema.default({}),
});

export type RunnerConfig = z.infer<typeof ConfigSchema>;
export type SandboxConfig = RunnerConfig['sandbox'];
export type RegistrationPolicy = RunnerConfig['registry']['policy'];
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
