import type { Command } from 'commander';
import type { RunnerConfig } from '../config/schema.js';
import { SANDBOX_API_KEY_ENV } from '../sandbox/providers.js';
import type { SessionStore } from '../sandbox/session-store.js';
import { createSandboxSession, executeSandboxScript } from '../sandbox/sessions.js';
import type { SandboxBackend, SandboxProvider } from '../sandbox/types.js';
import { maskCredential } from '../utils/secret-redaction.js';
import { parseBackend, writeError } from './shared.js';

export interface SandboxCliServices {
	config: RunnerConfig;
	store: SessionStore;
	env: Record<string, string | undefined>;
	openProvider(backend: SandboxBackend): Promise<SandboxProvider>;
}

interface RegisterSandboxCommandOptions {
	resolveServices(configPath?: string): Promise<SandboxCliServices>;
}

export interface CreateCommandInput {
	script: string;
	name?: string;
	template?: string;
	backend?: SandboxBackend;
}

export interface ExecCommandInput {
	script?: string;
	id?: string;
	name?: string;
	backend?: SandboxBackend;
}

export interface SandboxCliHandlers {
	create(input: CreateCommandInput): Promise<string>;
	exec(input: ExecCommandInput): Promise<string>;
}

export function createSandboxCliHandlers(services: SandboxCliServices): SandboxCliHandlers {
	const { config } = services;

	function apiKeyLine(backend: SandboxBackend): string {
		return `API key: ${maskCredential(services.env[SANDBOX_API_KEY_ENV[backend]] ?? '')}`;
	}

	async function create(input: CreateCommandInput): Promise<string> {
		if (!input.script) {
			throw new Error('Script content is required to create a sandbox');
		}
		const backend = input.backend ?? config.sandbox.backend;
		const provider = await services.openProvider(backend);
		const session = await createSandboxSession({
			provider,
			store: services.store,
			script: input.script,
			name: input.name,
			template: input.template || config.sandbox.template,
		});

		return `${[
			'Sandbox created',
			`ID: ${session.info.id}`,
			`URL: ${session.info.url}`,
			`Title: ${session.info.title ?? 'N/A'}`,
			apiKeyLine(backend),
			`Saved to: ${session.recordPath}`,
		].join('\n')}\n`;
	}

	async function exec(input: ExecCommandInput): Promise<string> {
		const backend = input.backend ?? config.sandbox.backend;
		const provider = await services.openProvider(backend);
		const result = await executeSandboxScript({
			provider,
			store: services.store,
			sandboxId: input.id,
			name: input.name,
			script: input.script,
			template: config.sandbox.template,
			installTimeoutMs: config.sandbox.installTimeoutMs,
			executionTimeoutMs: config.sandbox.executionTimeoutMs,
		});

		const lines = [
			result.created ? `Created sandbox ${result.sandboxId}` : `Sandbox: ${result.sandboxId}`,
			`URL: ${result.url}`,
		];
		if (result.mode === 'manual') {
			lines.push(
				`The ${backend} backend cannot run commands; open the URL and run python main.py there.`,
			);
			return `${lines.join('\n')}\n`;
		}
		if (result.installWarning) {
			lines.push(`Warning: dependency installation failed: ${result.installWarning}`);
		}
		lines.push('Output:', result.output);
		return `${lines.join('\n')}\n`;
	}

	return { create, exec };
}

export function registerSandboxCommands(
	program: Command,
	options: RegisterSandboxCommandOptions,
): void {
	const sandbox = program.command('sandbox').description('Cloud sandbox operations');

	async function withHandlers(configPath: string | undefined): Promise<SandboxCliHandlers> {
		return createSandboxCliHandlers(await options.resolveServices(configPath));
	}

	sandbox
		.command('create')
		.requiredOption('-s, --script <content>', 'Python script content for main.py')
		.option('-n, --name <name>', 'Sandbox name (default python-script)')
		.option('--template <template>', 'Sandbox template')
		.option('-b, --backend <backend>', 'rest or sdk', parseBackend)
		.option('-c, --config <path>', 'Path to config file')
		.description('Create a sandbox holding a Python script')
		.action(async (commandOptions: CreateCommandInput & { config?: string }) => {
			try {
				const handlers = await withHandlers(commandOptions.config);
				process.stdout.write(await handlers.create(commandOptions));
			} catch (error) {
				writeError(error);
				process.exitCode = 1;
			}
		});

	sandbox
		.command('exec')
		.option('-s, --script <content>', 'Script written to main.py when the sandbox has none')
		.option('-i, --id <id>', 'Sandbox id')
		.option('-n, --name <name>', 'Stored sandbox name (default python-execution)')
		.option('-b, --backend <backend>', 'rest or sdk', parseBackend)
		.option('-c, --config <path>', 'Path to config file')
		.description('Run main.py in a sandbox')
		.action(async (commandOptions: ExecCommandInput & { config?: string }) => {
			try {
				const handlers = await withHandlers(commandOptions.config);
				process.stdout.write(await handlers.exec(commandOptions));
			} catch (error) {
				writeError(error);
				process.exitCode = 1;
			}
		});
}
