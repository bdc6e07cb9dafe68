import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getConfig, initConfig, loadConfig, resetConfig } from '../loader.js';

const testDir = join(tmpdir(), 'script-runner-test-config');
const testConfigPath = join(testDir, 'config.yaml');

beforeEach(() => {
	mkdirSync(testDir, { recursive: true });
	resetConfig();
});

afterEach(() => {
	rmSync(testDir, { recursive: true, force: true });
	resetConfig();
});

describe('loadConfig', () => {
	it('returns defaults when config file does not exist', () => {
		const result = loadConfig('/nonexistent/config.yaml');
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.version).toBe(1);
			expect(result.value.registry.namespace).toBe('python_script_runner');
			expect(result.value.registry.policy).toBe('fail-fast');
			expect(result.value.catalog.includeDeprecated).toBe(false);
			expect(result.value.sandbox.backend).toBe('sdk');
			expect(result.value.sandbox.executionTimeoutMs).toBe(300_000);
			expect(result.value.logging.level).toBe('info');
		}
	});

	it('converts snake_case keys and validates values', () => {
		writeFileSync(
			testConfigPath,
			`
version: 1
registry:
  namespace: "scripts"
  policy: best-effort
catalog:
  include_deprecated: true
sandbox:
  backend: rest
  session_dir: /var/tmp/sessions
  execution_timeout_ms: 1000
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.registry.namespace).toBe('scripts');
			expect(result.value.registry.policy).toBe('best-effort');
			expect(result.value.catalog.includeDeprecated).toBe(true);
			expect(result.value.sandbox.backend).toBe('rest');
			expect(result.value.sandbox.sessionDir).toBe('/var/tmp/sessions');
			expect(result.value.sandbox.executionTimeoutMs).toBe(1000);
		}
	});

	it('keeps environment variable names and file paths verbatim', () => {
		writeFileSync(
			testConfigPath,
			`
common:
  env:
    PIP_NO_CACHE_DIR: "1"
    http_proxy: "http://proxy.local:3128"
  files:
    /etc/pip_conf/pip.conf: "[global]"
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.common.env).toEqual({
				PIP_NO_CACHE_DIR: '1',
				http_proxy: 'http://proxy.local:3128',
			});
			expect(result.value.common.files).toEqual({ '/etc/pip_conf/pip.conf': '[global]' });
		}
	});

	it('resolves environment variable references', () => {
		process.env.TEST_RUNNER_NAMESPACE = 'from-env';
		writeFileSync(
			testConfigPath,
			`
registry:
  namespace: "\${TEST_RUNNER_NAMESPACE}"
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.registry.namespace).toBe('from-env');
		}

		delete process.env.TEST_RUNNER_NAMESPACE;
	});

	it('returns error for invalid YAML syntax', () => {
		writeFileSync(testConfigPath, '{{invalid yaml:::');

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain('Failed to parse config');
		}
	});

	it('returns error for invalid config values', () => {
		writeFileSync(
			testConfigPath,
			`
registry:
  policy: sometimes
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain('Invalid configuration');
			expect(result.error.message).toContain('registry.policy');
		}
	});
});

describe('initConfig / getConfig', () => {
	it('throws before initialization', () => {
		expect(() => getConfig()).toThrow('Config not initialized');
	});

	it('stores the loaded config', () => {
		const result = initConfig('/nonexistent/config.yaml');
		expect(result.ok).toBe(true);
		expect(getConfig().registry.namespace).toBe('python_script_runner');
	});
});
