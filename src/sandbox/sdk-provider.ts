import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { SandboxError } from './errors.js';
import type {
	CreateSandboxRequest,
	SandboxHandle,
	SandboxInfo,
	SandboxPrivacy,
	SandboxProvider,
} from './types.js';

const logger = createLogger('sandbox:sdk');

const SDK_PACKAGE = '@codesandbox/sdk';
const SESSION_ID = 'script-runner';

/** The parts of a connected SDK session this package uses. */
export interface SdkSession {
	fs: {
		writeTextFile(path: string, content: string): Promise<unknown>;
		readTextFile(path: string): Promise<string>;
	};
	commands: {
		run(command: string, options?: { timeout?: number }): Promise<string>;
	};
}

export interface SdkSandbox {
	id: string;
	title?: string | null;
	description?: string | null;
	bootupType?: string;
	connect(options?: { id?: string; permission?: 'read' | 'write' }): Promise<SdkSession>;
}

export interface SdkClient {
	sandboxes: {
		create(options: {
			title: string;
			description: string;
			files: Record<string, { content: string }>;
			template: string;
			privacy: SandboxPrivacy;
			hibernationTimeoutSeconds: number;
		}): Promise<SdkSandbox>;
		resume(sandboxId: string): Promise<SdkSandbox>;
	};
}

export interface SdkSandboxProviderOptions {
	client: SdkClient;
	sandboxUrlBase: string;
	privacy: SandboxPrivacy;
	hibernationTimeoutSeconds: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object';
}

function isSdkClient(value: unknown): boolean {
	if (!isRecord(value) || !isRecord(value.sandboxes)) return false;
	return (
		typeof value.sandboxes.create === 'function' && typeof value.sandboxes.resume === 'function'
	);
}

const SdkModuleSchema = z.object({
	CodeSandbox: z.custom<new (apiKey: string) => unknown>((value) => typeof value === 'function'),
});

const SdkClientSchema = z.custom<SdkClient>(isSdkClient);

/**
 * Imports the SDK package on first use so the REST backend and the rest of the
 * package load without it. `specifier` selects a compatible client package.
 */
export async function loadSdkClient(
	apiKey: string,
	specifier: string = SDK_PACKAGE,
): Promise<SdkClient> {
	let imported: unknown;
	try {
		imported = await import(specifier);
	} catch (error) {
		throw new SandboxError(
			`Could not load ${specifier}: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	const sdkModule = SdkModuleSchema.safeParse(imported);
	if (!sdkModule.success) {
		throw new SandboxError(`${specifier} does not export a CodeSandbox client`);
	}
	const client = SdkClientSchema.safeParse(new sdkModule.data.CodeSandbox(apiKey));
	if (!client.success) {
		throw new SandboxError(`${specifier} client has no sandboxes API`);
	}
	return client.data;
}

/** Creates, resumes and drives sandboxes through a session SDK client. */
export function createSdkSandboxProvider(options: SdkSandboxProviderOptions): SandboxProvider {
	const sandboxUrlBase = options.sandboxUrlBase.replace(/\/+$/, '');

	function describe(sandbox: SdkSandbox, fallback?: CreateSandboxRequest): SandboxInfo {
		return {
			id: sandbox.id,
			url: `${sandboxUrlBase}/${sandbox.id}`,
			title: sandbox.title ?? fallback?.title ?? null,
			description: sandbox.description ?? fallback?.description ?? null,
			cleanBoot: sandbox.bootupType === undefined || sandbox.bootupType === 'CLEAN',
		};
	}

	async function create(request: CreateSandboxRequest): Promise<SandboxInfo> {
		const files = Object.fromEntries(
			Object.entries(request.files).map(([path, content]) => [path, { content }]),
		);
		const sandbox = await options.client.sandboxes.create({
			title: request.title,
			description: request.description,
			files,
			template: request.template,
			privacy: options.privacy,
			hibernationTimeoutSeconds: options.hibernationTimeoutSeconds,
		});
		logger.info('Sandbox created', { id: sandbox.id, backend: 'sdk' });
		return describe(sandbox, request);
	}

	async function connect(sandboxId: string): Promise<SandboxHandle> {
		const sandbox = await options.client.sandboxes.resume(sandboxId);
		const session = await sandbox.connect({ id: SESSION_ID, permission: 'write' });
		logger.debug('Connected to sandbox', { id: sandbox.id, bootupType: sandbox.bootupType });

		return {
			info: describe(sandbox),
			canExecute: true,
			async writeTextFile(path, content) {
				await session.fs.writeTextFile(path, content);
			},
			readTextFile: (path) => session.fs.readTextFile(path),
			run: (command, runOptions) => session.commands.run(command, { timeout: runOptions.timeoutMs }),
		};
	}

	return { backend: 'sdk', create, connect };
}
