export { expandHome, getDefaultConfigPath, getRunnerHome } from './defaults.js';
export { getConfig, initConfig, loadConfig, resetConfig, type Result } from './loader.js';
export {
	ConfigSchema,
	type LogLevel,
	type RegistrationPolicy,
	type RunnerConfig,
	type SandboxConfig,
} from './schema.js';
