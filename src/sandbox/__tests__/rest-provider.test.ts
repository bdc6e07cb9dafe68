import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	SandboxAuthError,
	SandboxRequestError,
	SandboxUnsupportedError,
} from '../errors.js';
import { createRestSandboxProvider } from '../rest-provider.js';

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'Content-Type': 'application/json' },
	});
}

const provider = createRestSandboxProvider({
	apiKey: 'test-secret',
	apiBaseUrl: 'https://sandbox.example.test/api/v1/',
	sandboxUrlBase: 'https://sandbox.example.test/s',
	timeoutMs: 1_000,
});

const request = {
	title: 'demo',
	description: 'Python script sandbox',
	files: { 'main.py': 'print(1)\n' },
	template: 'python',
};

afterEach(() => {
	vi.unstubAllGlobals();
});

describe('createRestSandboxProvider', () => {
	it('posts the files with bearer auth', async () => {
		const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
			jsonResponse({ id: 'abc123', title: 'Created' }),
		);
		vi.stubGlobal('fetch', fetchMock);

		const info = await provider.create(request);

		expect(info).toEqual({
			id: 'abc123',
			url: 'https://sandbox.example.test/s/abc123',
			title: 'Created',
			description: 'Python script sandbox',
			cleanBoot: true,
		});
		expect(fetchMock).toHaveBeenCalledTimes(1);
		const call = fetchMock.mock.calls[0];
		const init = call?.[1];
		expect(call?.[0]).toBe('https://sandbox.example.test/api/v1/sandboxes');
		expect(init?.method).toBe('POST');
		expect(init?.headers).toEqual({
			'Content-Type': 'application/json',
			Accept: 'application/json',
			Authorization: 'Bearer test-secret',
		});
		expect(JSON.parse(String(init?.body))).toEqual({
			files: { 'main.py': { content: 'print(1)\n' } },
			template: 'python',
		});
	});

	it('maps 401 and 403 to auth errors', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response('denied', { status: 401 })),
		);
		await expect(provider.create(request)).rejects.toBeInstanceOf(SandboxAuthError);

		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response('denied', { status: 403 })),
		);
		await expect(provider.create(request)).rejects.toThrow(
			'Access forbidden: the API key may not have permission to create sandboxes',
		);
	});

	it('reports other statuses with the response body', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response('quota exceeded', { status: 429 })),
		);

		const error = await provider.create(request).catch((err: unknown) => err);
		expect(error).toBeInstanceOf(SandboxRequestError);
		if (error instanceof SandboxRequestError) {
			expect(error.status).toBe(429);
			expect(error.message).toBe('API error 429: quota exceeded');
		}
	});

	it('wraps transport failures', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => {
				throw new TypeError('fetch failed');
			}),
		);
		await expect(provider.create(request)).rejects.toThrow('Request failed: fetch failed');
	});

	it('rejects responses without an id', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => jsonResponse({ title: 'no id' })),
		);
		await expect(provider.create(request)).rejects.toThrow('Sandbox API response has no sandbox id');
	});

	it('returns handles that cannot execute', async () => {
		const handle = await provider.connect('abc123');

		expect(handle.canExecute).toBe(false);
		expect(handle.info.url).toBe('https://sandbox.example.test/s/abc123');
		await expect(handle.run('python main.py', { timeoutMs: 1_000 })).rejects.toBeInstanceOf(
			SandboxUnsupportedError,
		);
		await expect(handle.readTextFile('main.py')).rejects.toThrow(
			'The rest sandbox backend cannot read files',
		);
	});
});
