import type { SandboxConfig } from '../config/schema.js';
import { SandboxAuthError } from './errors.js';
import { createRestSandboxProvider } from './rest-provider.js';
import { createSdkSandboxProvider, loadSdkClient, type SdkClient } from './sdk-provider.js';
import type { SandboxBackend, SandboxProvider } from './types.js';

/** The secret each backend authenticates with. */
export const SANDBOX_API_KEY_ENV: Record<SandboxBackend, string> = {
	rest: 'CODE_SANDBOX_API',
	sdk: 'CSB_API_KEY',
};

export function readSandboxApiKey(
	backend: SandboxBackend,
	env: NodeJS.ProcessEnv = process.env,
): string {
	const name = SANDBOX_API_KEY_ENV[backend];
	const value = env[name];
	if (!value) {
		throw new SandboxAuthError(`${name} is not set`);
	}
	return value;
}

export interface OpenSandboxProviderOptions {
	config: SandboxConfig;
	backend?: SandboxBackend;
	env?: NodeJS.ProcessEnv;
	/** Builds the SDK client; defaults to importing the SDK package. */
	loadClient?: (apiKey: string) => Promise<SdkClient>;
}

export async function openSandboxProvider(
	options: OpenSandboxProviderOptions,
): Promise<SandboxProvider> {
	const { config } = options;
	const backend = options.backend ?? config.backend;
	const apiKey = readSandboxApiKey(backend, options.env);

	if (backend === 'rest') {
		return createRestSandboxProvider({
			apiKey,
			apiBaseUrl: config.apiBaseUrl,
			sandboxUrlBase: config.sandboxUrlBase,
			timeoutMs: config.requestTimeoutMs,
		});
	}

	const loadClient = options.loadClient ?? ((key: string) => loadSdkClient(key));
	return createSdkSandboxProvider({
		client: await loadClient(apiKey),
		sandboxUrlBase: config.sandboxUrlBase,
		privacy: config.privacy,
		hibernationTimeoutSeconds: config.hibernationTimeoutSeconds,
	});
}
