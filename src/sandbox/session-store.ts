import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sandbox:sessions');

const SessionRecordSchema = z.object({
	recordId: z.string().uuid(),
	name: z.string().min(1),
	backend: z.enum(['rest', 'sdk']),
	sandboxId: z.string().min(1),
	url: z.string(),
	title: z.string().nullable(),
	createdAt: z.string(),
	lastExecutedAt: z.string().optional(),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export interface SessionStore {
	pathFor(name: string): string;
	/** Null when nothing usable is stored under the name. */
	load(name: string): SessionRecord | null;
	/** Returns the path written. */
	save(record: SessionRecord): string;
}

export function sanitizeSessionName(name: string): string {
	return name.replace(/[^A-Za-z0-9]/g, '_');
}

/** Stores one JSON record per sandbox name, as `sandbox_<name>.json`. */
export function createSessionStore(dir: string): SessionStore {
	function pathFor(name: string): string {
		return join(dir, `sandbox_${sanitizeSessionName(name)}.json`);
	}

	function load(name: string): SessionRecord | null {
		const path = pathFor(name);
		if (!existsSync(path)) return null;

		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(path, 'utf-8'));
		} catch (error) {
			logger.warn('Could not read stored sandbox', {
				path,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}

		const parsed = SessionRecordSchema.safeParse(raw);
		if (!parsed.success) {
			logger.warn('Ignoring malformed sandbox record', { path });
			return null;
		}
		return parsed.data;
	}

	function save(record: SessionRecord): string {
		const path = pathFor(record.name);
		mkdirSync(dir, { recursive: true });
		writeFileSync(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
		logger.debug('Sandbox record saved', { path, sandboxId: record.sandboxId });
		return path;
	}

	return { pathFor, load, save };
}
