#!/usr/bin/env node

import { Command } from 'commander';
import { registerSandboxCommands } from './cli/sandbox.js';
import { registerToolsCommands } from './cli/tools.js';
import { expandHome, getConfig, initConfig, type RunnerConfig } from './config/index.js';
import { createShellLauncher } from './runtime/shell-launcher.js';
import { openSandboxProvider } from './sandbox/providers.js';
import { createSessionStore } from './sandbox/session-store.js';
import { initLogger } from './utils/logger.js';

function initRunnerConfig(configPath?: string): RunnerConfig {
	const configResult = initConfig(configPath);
	if (!configResult.ok) {
		throw configResult.error;
	}
	const config = getConfig();
	initLogger({
		level: config.logging.level,
		filePath: expandHome(config.logging.file),
		silent: true,
	});
	return config;
}

const program = new Command();

program
	.name('script-runner')
	.description('Python script runner tools for local containers and cloud sandboxes')
	.version('0.1.0');

registerToolsCommands(program, {
	async resolveServices(configPath?: string) {
		const config = initRunnerConfig(configPath);
		return {
			config,
			launcher: createShellLauncher(),
			catalogPath: config.catalog.path ? expandHome(config.catalog.path) : undefined,
		};
	},
});

registerSandboxCommands(program, {
	async resolveServices(configPath?: string) {
		const config = initRunnerConfig(configPath);
		return {
			config,
			store: createSessionStore(expandHome(config.sandbox.sessionDir)),
			env: process.env,
			openProvider: (backend) => openSandboxProvider({ config: config.sandbox, backend }),
		};
	},
});

await program.parseAsync();
