export { buildInvocationEnv, type InvokeToolOptions, invokeTool } from './invoke.js';
export { createShellLauncher, type ShellLauncherOptions } from './shell-launcher.js';
export type {
	CompletedInvocation,
	InvalidInvocation,
	InvocationResult,
	LaunchRequest,
	LaunchResult,
	ScriptLauncher,
} from './types.js';
