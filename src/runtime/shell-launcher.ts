import { execFile } from 'node:child_process';
import type { LaunchRequest, LaunchResult, ScriptLauncher } from './types.js';

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export interface ShellLauncherOptions {
	/** Defaults to `bash`, resolved through PATH. */
	shell?: string;
	/** Largest stdout or stderr a script may produce. Defaults to 10 MiB. */
	maxBufferBytes?: number;
}

/** Runs payloads with `<shell> -c`, inheriting the current process environment. */
export function createShellLauncher(options: ShellLauncherOptions = {}): ScriptLauncher {
	const shell = options.shell ?? 'bash';
	const maxBuffer = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

	function launch(request: LaunchRequest): Promise<LaunchResult> {
		return new Promise((resolve, reject) => {
			execFile(
				shell,
				['-c', request.script],
				{
					timeout: request.timeoutMs,
					maxBuffer,
					cwd: request.cwd,
					env: { ...process.env, ...request.env },
				},
				(error, stdout, stderr) => {
					if (!error) {
						resolve({ exitCode: 0, stdout: String(stdout), stderr: String(stderr) });
						return;
					}
					if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
						reject(new Error(`Script output exceeded ${maxBuffer} bytes`));
						return;
					}
					if (error.killed) {
						reject(new Error(`Script timed out after ${request.timeoutMs}ms`));
						return;
					}
					if (typeof error.code === 'number') {
						// Normal completion with a non-zero exit code
						resolve({ exitCode: error.code, stdout: String(stdout), stderr: String(stderr) });
						return;
					}
					// Process-level error (e.g. spawn failure)
					reject(error);
				},
			);
		});
	}

	return { launch };
}
