import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { SandboxError } from './errors.js';
import type { SessionRecord, SessionStore } from './session-store.js';
import type { SandboxHandle, SandboxInfo, SandboxProvider } from './types.js';

const logger = createLogger('sandbox:sessions');

export const DEFAULT_CREATE_NAME = 'python-script';
export const DEFAULT_EXECUTE_NAME = 'python-execution';

const SCRIPT_FILE = 'main.py';
const REQUIREMENTS = ['pandas', 'numpy', 'requests', 'boto3', 'openpyxl', 'lxml'];

export function defaultSandboxFiles(name: string, script: string): Record<string, string> {
	return {
		[SCRIPT_FILE]: script,
		'requirements.txt': `${REQUIREMENTS.join('\n')}\n`,
		'README.md': [
			`# ${name}`,
			'',
			'Python script sandbox.',
			'',
			'## Usage',
			'',
			'1. Install dependencies: `pip install -r requirements.txt`',
			'2. Run the script: `python main.py`',
			'',
		].join('\n'),
	};
}

interface SessionContext {
	provider: SandboxProvider;
	store: SessionStore;
	now?: () => Date;
}

export interface CreateSandboxSessionOptions extends SessionContext {
	script: string;
	/** Defaults to `python-script`. */
	name?: string;
	template: string;
}

export interface CreatedSandboxSession {
	info: SandboxInfo;
	record: SessionRecord;
	recordPath: string;
}

export interface ExecuteSandboxScriptOptions extends SessionContext {
	sandboxId?: string;
	/** Where a sandbox id is looked up and saved. Defaults to `python-execution`. */
	name?: string;
	/** Creates the sandbox when none is known, and fills in a missing main.py. */
	script?: string;
	template: string;
	installTimeoutMs: number;
	executionTimeoutMs: number;
}

export type SandboxExecution =
	| {
			mode: 'manual';
			sandboxId: string;
			url: string;
			created: boolean;
	  }
	| {
			mode: 'executed';
			sandboxId: string;
			url: string;
			created: boolean;
			output: string;
			/** Set when installing requirements failed and execution went ahead anyway. */
			installWarning: string | null;
	  };

function nonEmpty(value: string | undefined): string | undefined {
	return value && value.length > 0 ? value : undefined;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export async function createSandboxSession(
	options: CreateSandboxSessionOptions,
): Promise<CreatedSandboxSession> {
	const name = nonEmpty(options.name) ?? DEFAULT_CREATE_NAME;
	const now = options.now ?? (() => new Date());

	const info = await options.provider.create({
		title: name,
		description: 'Python script sandbox',
		files: defaultSandboxFiles(name, options.script),
		template: options.template,
	});

	const handle = await options.provider.connect(info.id);
	if (handle.canExecute) {
		await handle.writeTextFile(SCRIPT_FILE, options.script);
	}

	const record: SessionRecord = {
		recordId: uuidv4(),
		name,
		backend: options.provider.backend,
		sandboxId: info.id,
		url: info.url,
		title: info.title,
		createdAt: now().toISOString(),
	};
	const recordPath = options.store.save(record);
	logger.info('Sandbox session created', { name, sandboxId: info.id, recordPath });

	return { info, record, recordPath };
}

async function ensureScript(handle: SandboxHandle, script: string | undefined): Promise<void> {
	try {
		await handle.readTextFile(SCRIPT_FILE);
		return;
	} catch (error) {
		if (!script) {
			throw new SandboxError(
				`${SCRIPT_FILE} not found in sandbox ${handle.info.id} and no script content provided: ${errorMessage(error)}`,
			);
		}
		logger.info('Writing missing script to sandbox', { sandboxId: handle.info.id });
	}
	await handle.writeTextFile(SCRIPT_FILE, script);
}

/** The record stored under `name`, unless another backend wrote it. */
function loadBackendRecord(context: SessionContext, name: string): SessionRecord | null {
	const record = context.store.load(name);
	if (record && record.backend !== context.provider.backend) {
		logger.warn('Ignoring sandbox stored by another backend', {
			name,
			storedBackend: record.backend,
			backend: context.provider.backend,
		});
		return null;
	}
	return record;
}

/**
 * Runs main.py in a sandbox. The sandbox is the given id, else the one stored
 * under the name, else a new one built from the script.
 */
export async function executeSandboxScript(
	options: ExecuteSandboxScriptOptions,
): Promise<SandboxExecution> {
	const name = nonEmpty(options.name) ?? DEFAULT_EXECUTE_NAME;
	const script = nonEmpty(options.script);
	const now = options.now ?? (() => new Date());
	const stored = loadBackendRecord(options, name);

	let sandboxId = nonEmpty(options.sandboxId) ?? stored?.sandboxId;
	let created = false;
	if (!sandboxId) {
		if (!script) {
			throw new SandboxError(
				`No sandbox id given and none stored under "${name}"; provide a sandbox id or script content`,
			);
		}
		const session = await createSandboxSession({ ...options, name, script });
		sandboxId = session.info.id;
		created = true;
	}

	const handle = await options.provider.connect(sandboxId);
	if (!handle.canExecute) {
		logger.info('Sandbox ready for manual execution', { sandboxId, url: handle.info.url });
		return { mode: 'manual', sandboxId, url: handle.info.url, created };
	}

	await ensureScript(handle, script);

	let installWarning: string | null = null;
	if (handle.info.cleanBoot) {
		try {
			await handle.run('pip install -r requirements.txt', { timeoutMs: options.installTimeoutMs });
		} catch (error) {
			installWarning = errorMessage(error);
			logger.warn('Dependency installation failed; continuing', {
				sandboxId,
				error: installWarning,
			});
		}
	}

	const output = await handle.run(`python ${SCRIPT_FILE}`, {
		timeoutMs: options.executionTimeoutMs,
	});

	const current = loadBackendRecord(options, name);
	options.store.save({
		recordId: current?.recordId ?? uuidv4(),
		name,
		backend: options.provider.backend,
		sandboxId,
		url: handle.info.url,
		title: current?.title ?? handle.info.title,
		createdAt: current?.createdAt ?? now().toISOString(),
		lastExecutedAt: now().toISOString(),
	});
	logger.info('Sandbox script executed', { sandboxId, created });

	return { mode: 'executed', sandboxId, url: handle.info.url, created, output, installWarning };
}
