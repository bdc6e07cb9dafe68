export interface LaunchRequest {
	script: string;
	/** Added to the launcher's own environment. */
	env: Record<string, string>;
	timeoutMs: number;
	cwd?: string;
}

export interface LaunchResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

/**
 * Runs a rendered payload. Resolves with non-zero exit codes and rejects only
 * when the script could not run to completion.
 */
export interface ScriptLauncher {
	launch(request: LaunchRequest): Promise<LaunchResult>;
}

export interface InvalidInvocation {
	status: 'invalid';
	tool: string;
	message: string;
}

export interface CompletedInvocation {
	status: 'succeeded' | 'failed';
	tool: string;
	runId: string;
	exitCode: number;
	stdout: string;
	stderr: string;
	durationMs: number;
}

export type InvocationResult = InvalidInvocation | CompletedInvocation;
