import { mkdirSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createLogger, initLogger, resetLogger } from '../logger.js';

const testDir = join(tmpdir(), 'script-runner-test-logger');
const testLogPath = join(testDir, 'test.log');

beforeEach(() => {
	mkdirSync(testDir, { recursive: true });
	resetLogger();
});

afterEach(() => {
	rmSync(testDir, { recursive: true, force: true });
	resetLogger();
});

const LogEntrySchema = z.record(z.unknown());

function readEntries(): Array<Record<string, unknown>> {
	return readFileSync(testLogPath, 'utf-8')
		.trim()
		.split('\n')
		.map((line) => LogEntrySchema.parse(JSON.parse(line)));
}

describe('createLogger', () => {
	it('writes structured JSON entries to the log file', () => {
		initLogger({ level: 'debug', filePath: testLogPath, silent: true });

		createLogger('test-module').info('hello world', { key: 'value', count: 2 });

		const [entry] = readEntries();
		expect(entry?.level).toBe('info');
		expect(entry?.module).toBe('test-module');
		expect(entry?.message).toBe('hello world');
		expect(entry?.key).toBe('value');
		expect(entry?.count).toBe(2);
	});

	it('filters messages below configured level', () => {
		initLogger({ level: 'warn', filePath: testLogPath, silent: true });

		const logger = createLogger('test-module');
		logger.debug('hidden');
		logger.info('hidden');
		logger.warn('shown');

		const entries = readEntries();
		expect(entries).toHaveLength(1);
		expect(entries[0]?.message).toBe('shown');
	});

	it('does not let context override the entry header', () => {
		initLogger({ level: 'info', filePath: testLogPath, silent: true });

		createLogger('owner').info('msg', { module: 'spoofed', level: 'error' });

		const [entry] = readEntries();
		expect(entry?.module).toBe('owner');
		expect(entry?.level).toBe('info');
	});

	it('redacts secrets in messages and context', () => {
		initLogger({ level: 'info', filePath: testLogPath, silent: true });

		createLogger('secrets').info('Using CSB_API_KEY=test-secret-value', {
			header: 'Bearer test-secret-token',
		});

		const [entry] = readEntries();
		expect(entry?.message).toBe('Using CSB_API_KEY=[REDACTED]');
		expect(entry?.header).toBe('Bearer [REDACTED]');
	});

	it('includes timestamp in ISO format', () => {
		initLogger({ level: 'info', filePath: testLogPath, silent: true });

		createLogger('time-test').info('ts test');

		const [entry] = readEntries();
		const timestamp = String(entry?.timestamp);
		expect(new Date(timestamp).toISOString()).toBe(timestamp);
	});
});
