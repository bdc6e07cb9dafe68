import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { SandboxAuthError, SandboxRequestError, SandboxUnsupportedError } from './errors.js';
import type { CreateSandboxRequest, SandboxHandle, SandboxInfo, SandboxProvider } from './types.js';

const logger = createLogger('sandbox:rest');

const MAX_ERROR_BODY_LENGTH = 500;

const CreatedSandboxSchema = z
	.object({
		id: z.string().min(1),
		title: z.string().nullish(),
		description: z.string().nullish(),
	})
	.passthrough();

export interface RestSandboxProviderOptions {
	apiKey: string;
	apiBaseUrl: string;
	sandboxUrlBase: string;
	timeoutMs: number;
}

function trimSlash(url: string): string {
	return url.replace(/\/+$/, '');
}

/**
 * Creates sandboxes through the public REST API. The API has no execution
 * endpoint, so handles only describe the sandbox.
 */
export function createRestSandboxProvider(options: RestSandboxProviderOptions): SandboxProvider {
	const apiBaseUrl = trimSlash(options.apiBaseUrl);
	const sandboxUrlBase = trimSlash(options.sandboxUrlBase);

	function sandboxUrl(id: string): string {
		return `${sandboxUrlBase}/${id}`;
	}

	async function create(request: CreateSandboxRequest): Promise<SandboxInfo> {
		const files = Object.fromEntries(
			Object.entries(request.files).map(([path, content]) => [path, { content }]),
		);
		const url = `${apiBaseUrl}/sandboxes`;

		let response: Response;
		try {
			response = await fetch(url, {
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					Accept: 'application/json',
					Authorization: `Bearer ${options.apiKey}`,
				},
				body: JSON.stringify({ files, template: request.template }),
				signal: AbortSignal.timeout(options.timeoutMs),
			});
		} catch (error) {
			throw new SandboxRequestError(
				`Request failed: ${error instanceof Error ? error.message : String(error)}`,
			);
		}

		logger.debug('Sandbox API responded', { url, status: response.status });

		if (response.status === 401) {
			throw new SandboxAuthError(
				'Authentication failed: check that the API key is correct and not expired',
				401,
			);
		}
		if (response.status === 403) {
			throw new SandboxAuthError(
				'Access forbidden: the API key may not have permission to create sandboxes',
				403,
			);
		}
		if (!response.ok) {
			const body = (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
			throw new SandboxRequestError(`API error ${response.status}: ${body}`, response.status);
		}

		let payload: unknown;
		try {
			payload = await response.json();
		} catch (error) {
			throw new SandboxRequestError(
				`Invalid JSON from sandbox API: ${error instanceof Error ? error.message : String(error)}`,
				response.status,
			);
		}
		const parsed = CreatedSandboxSchema.safeParse(payload);
		if (!parsed.success) {
			throw new SandboxRequestError('Sandbox API response has no sandbox id', response.status);
		}

		logger.info('Sandbox created', { id: parsed.data.id, backend: 'rest' });
		return {
			id: parsed.data.id,
			url: sandboxUrl(parsed.data.id),
			title: parsed.data.title ?? request.title,
			description: parsed.data.description ?? request.description,
			cleanBoot: true,
		};
	}

	async function connect(sandboxId: string): Promise<SandboxHandle> {
		const unsupported = (operation: string) => async () => {
			throw new SandboxUnsupportedError(operation, 'rest');
		};
		return {
			info: {
				id: sandboxId,
				url: sandboxUrl(sandboxId),
				title: null,
				description: null,
				cleanBoot: false,
			},
			canExecute: false,
			writeTextFile: unsupported('write files'),
			readTextFile: unsupported('read files'),
			run: unsupported('run commands'),
		};
	}

	return { backend: 'rest', create, connect };
}
