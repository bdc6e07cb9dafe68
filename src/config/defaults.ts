import { homedir, platform } from 'node:os';
import { join } from 'node:path';

/**
 * Resolves the base directory for runner data.
 * Checks SCRIPT_RUNNER_HOME first, then uses platform-specific defaults.
 */
export function getRunnerHome(): string {
	const envHome = process.env.SCRIPT_RUNNER_HOME;
	if (envHome) return envHome;

	const home = homedir();
	if (platform() === 'darwin') {
		return join(home, '.script-runner');
	}
	// Linux: respect XDG_DATA_HOME if set
	const xdgData = process.env.XDG_DATA_HOME;
	if (xdgData) {
		return join(xdgData, 'script-runner');
	}
	return join(home, '.script-runner');
}

export function getDefaultConfigPath(): string {
	return join(getRunnerHome(), 'config.yaml');
}

/** Expands a leading `~` to the user's home directory. */
export function expandHome(value: string): string {
	if (value === '~') return homedir();
	if (value.startsWith('~/')) return join(homedir(), value.slice(2));
	return value;
}
