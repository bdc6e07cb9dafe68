export type SandboxBackend = 'rest' | 'sdk';

export type SandboxPrivacy = 'public' | 'unlisted' | 'private';

export interface CreateSandboxRequest {
	title: string;
	description: string;
	/** File path to text content. */
	files: Record<string, string>;
	template: string;
}

export interface SandboxInfo {
	id: string;
	url: string;
	title: string | null;
	description: string | null;
	/** True when the sandbox started from scratch rather than from a snapshot. */
	cleanBoot: boolean;
}

export interface RunOptions {
	timeoutMs: number;
}

/** A connection to one sandbox. */
export interface SandboxHandle {
	readonly info: SandboxInfo;
	/**
	 * False when the backend can only create sandboxes; file and command
	 * operations then throw `SandboxUnsupportedError`.
	 */
	readonly canExecute: boolean;
	writeTextFile(path: string, content: string): Promise<void>;
	readTextFile(path: string): Promise<string>;
	/** Resolves with the command output. */
	run(command: string, options: RunOptions): Promise<string>;
}

export interface SandboxProvider {
	readonly backend: SandboxBackend;
	create(request: CreateSandboxRequest): Promise<SandboxInfo>;
	connect(sandboxId: string): Promise<SandboxHandle>;
}
