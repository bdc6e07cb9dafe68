export class SandboxError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'SandboxError';
	}
}

/** The provider rejected the API key (HTTP 401/403). */
export class SandboxAuthError extends SandboxError {
	readonly status: number | null;

	constructor(message: string, status: number | null = null) {
		super(message);
		this.name = 'SandboxAuthError';
		this.status = status;
	}
}

/** A provider request failed in transport or returned an unexpected response. */
export class SandboxRequestError extends SandboxError {
	readonly status: number | null;

	constructor(message: string, status: number | null = null) {
		super(message);
		this.name = 'SandboxRequestError';
		this.status = status;
	}
}

export class SandboxUnsupportedError extends SandboxError {
	constructor(operation: string, backend: string) {
		super(`The ${backend} sandbox backend cannot ${operation}`);
		this.name = 'SandboxUnsupportedError';
	}
}
