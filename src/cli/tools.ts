import type { Command } from 'commander';
import type { RunnerConfig } from '../config/schema.js';
import type { ArgumentSchema, ToolDescriptor } from '../descriptor/types.js';
import { initialize } from '../initialize.js';
import { createToolRegistry } from '../registry/memory-registry.js';
import { invokeTool } from '../runtime/invoke.js';
import type { InvocationResult, ScriptLauncher } from '../runtime/types.js';
import { collectArgument, parseTimeout, writeError } from './shared.js';

export interface ToolCliServices {
	config: RunnerConfig;
	launcher: ScriptLauncher;
	catalogPath?: string;
}

interface RegisterToolsCommandOptions {
	resolveServices(configPath?: string): Promise<ToolCliServices>;
}

export interface ToolValidation {
	valid: boolean;
	text: string;
}

export interface ToolCliHandlers {
	list(): string;
	show(name: string): string;
	validate(name: string, args: Record<string, string>): ToolValidation;
	run(
		name: string,
		args: Record<string, string>,
		options?: { timeoutMs?: number },
	): Promise<InvocationResult>;
	register(): string;
}

function formatArgument(argument: ArgumentSchema): string {
	if (argument.required) return `${argument.name} (required)`;
	if (argument.group) return `${argument.name} (one of: ${argument.group})`;
	return argument.name;
}

export function createToolCliHandlers(services: ToolCliServices): ToolCliHandlers {
	const { config } = services;
	let cached: ToolDescriptor[] | null = null;

	function descriptors(): ToolDescriptor[] {
		cached ??= initialize({ config, catalogPath: services.catalogPath }).descriptors;
		return cached;
	}

	function find(name: string): ToolDescriptor {
		const descriptor = descriptors().find((tool) => tool.name === name);
		if (!descriptor) {
			throw new Error(`Unknown tool "${name}"`);
		}
		return descriptor;
	}

	function list(): string {
		const tools = descriptors();
		if (tools.length === 0) return 'No tools found.\n';

		const lines: string[] = [];
		for (const tool of tools) {
			const flags = tool.metadata.deprecated ? ' | deprecated' : '';
			lines.push(`${tool.name} | ${tool.metadata.family ?? '-'} | ${tool.environment}${flags}`);
			const args = tool.arguments.map(formatArgument).join(', ');
			lines.push(`  args: ${args || '(none)'}`);
			if (tool.secrets.length > 0) {
				lines.push(`  secrets: ${tool.secrets.join(', ')}`);
			}
		}
		return `${lines.join('\n')}\n`;
	}

	function show(name: string): string {
		return find(name).getPayload();
	}

	function validate(name: string, args: Record<string, string>): ToolValidation {
		const message = find(name).describeMissing(args);
		if (message === null) {
			return { valid: true, text: `${name}: arguments are valid\n` };
		}
		return { valid: false, text: `${name}: ${message}\n` };
	}

	function run(
		name: string,
		args: Record<string, string>,
		options: { timeoutMs?: number } = {},
	): Promise<InvocationResult> {
		return invokeTool(find(name), args, {
			launcher: services.launcher,
			timeoutMs: options.timeoutMs ?? config.runtime.timeoutMs,
		});
	}

	function register(): string {
		const registry = createToolRegistry();
		const { reports } = initialize({ config, registry, catalogPath: services.catalogPath });

		const lines: string[] = [];
		for (const report of reports) {
			const registered = report.registered.join(', ') || '(none)';
			lines.push(`${report.toolSet} -> ${report.namespace}: ${registered}`);
			for (const failure of report.failed) {
				lines.push(`  failed ${failure.name}: ${failure.error}`);
			}
		}
		if (lines.length === 0) return 'No tools registered.\n';
		return `${lines.join('\n')}\n`;
	}

	return { list, show, validate, run, register };
}

export function registerToolsCommands(
	program: Command,
	options: RegisterToolsCommandOptions,
): void {
	const tools = program.command('tools').description('Tool descriptor operations');

	async function withHandlers(configPath: string | undefined): Promise<ToolCliHandlers> {
		return createToolCliHandlers(await options.resolveServices(configPath));
	}

	tools
		.command('list')
		.option('-c, --config <path>', 'Path to config file')
		.description('List the tools of the catalog')
		.action(async (commandOptions: { config?: string }) => {
			try {
				const handlers = await withHandlers(commandOptions.config);
				process.stdout.write(handlers.list());
			} catch (error) {
				writeError(error);
				process.exitCode = 1;
			}
		});

	tools
		.command('show')
		.argument('<name>', 'Tool name')
		.option('-c, --config <path>', 'Path to config file')
		.description('Print the payload script of a tool')
		.action(async (name: string, commandOptions: { config?: string }) => {
			try {
				const handlers = await withHandlers(commandOptions.config);
				process.stdout.write(handlers.show(name));
			} catch (error) {
				writeError(error);
				process.exitCode = 1;
			}
		});

	tools
		.command('validate')
		.argument('<name>', 'Tool name')
		.option('-a, --arg <key=value>', 'Tool argument (repeatable)', collectArgument)
		.option('-c, --config <path>', 'Path to config file')
		.description('Check arguments against a tool without running it')
		.action(
			async (name: string, commandOptions: { arg?: Record<string, string>; config?: string }) => {
				try {
					const handlers = await withHandlers(commandOptions.config);
					const result = handlers.validate(name, commandOptions.arg ?? {});
					process.stdout.write(result.text);
					if (!result.valid) process.exitCode = 1;
				} catch (error) {
					writeError(error);
					process.exitCode = 1;
				}
			},
		);

	tools
		.command('run')
		.argument('<name>', 'Tool name')
		.option('-a, --arg <key=value>', 'Tool argument (repeatable)', collectArgument)
		.option('-t, --timeout <ms>', 'Timeout in milliseconds', parseTimeout)
		.option('-c, --config <path>', 'Path to config file')
		.description('Run a tool payload on this machine')
		.action(
			async (
				name: string,
				commandOptions: { arg?: Record<string, string>; timeout?: number; config?: string },
			) => {
				try {
					const handlers = await withHandlers(commandOptions.config);
					const result = await handlers.run(name, commandOptions.arg ?? {}, {
						timeoutMs: commandOptions.timeout,
					});
					if (result.status === 'invalid') {
						process.stderr.write(`Error: ${result.message}\n`);
						process.exitCode = 1;
						return;
					}
					process.stdout.write(result.stdout);
					process.stderr.write(result.stderr);
					process.exitCode = result.exitCode;
				} catch (error) {
					writeError(error);
					process.exitCode = 1;
				}
			},
		);

	tools
		.command('register')
		.option('-c, --config <path>', 'Path to config file')
		.description('Register every tool set with an in-memory registry and print the report')
		.action(async (commandOptions: { config?: string }) => {
			try {
				const handlers = await withHandlers(commandOptions.config);
				process.stdout.write(handlers.register());
			} catch (error) {
				writeError(error);
				process.exitCode = 1;
			}
		});
}
