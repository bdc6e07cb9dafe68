import { describe, expect, it } from 'vitest';
import { quoteShell, renderPayload, renderStep, renderValue } from '../render.js';
import type { PayloadStep } from '../types.js';

describe('quoteShell', () => {
	it('leaves plain words bare', () => {
		expect(quoteShell('pandas')).toBe('pandas');
		expect(quoteShell('/tmp/temp_script.py')).toBe('/tmp/temp_script.py');
	});

	it('single-quotes words with spaces or quotes', () => {
		expect(quoteShell('hello world')).toBe("'hello world'");
		expect(quoteShell("it's")).toBe("'it'\\''s'");
		expect(quoteShell('$HOME')).toBe("'$HOME'");
	});
});

describe('renderValue', () => {
	it('expands arguments and environment values in double quotes', () => {
		expect(renderValue({ arg: 'script_content' })).toBe('"$script_content"');
		expect(renderValue({ env: 'CSB_API_KEY' })).toBe('"$CSB_API_KEY"');
	});
});

describe('renderStep', () => {
	it('renders required package installs with a failure exit', () => {
		expect(renderStep({ kind: 'ensure-packages', manager: 'pip', packages: ['pandas'] })).toEqual([
			"echo 'Installing pip packages: pandas'",
			'pip install --upgrade pip >/dev/null 2>&1 || true',
			'pip install pandas >/dev/null 2>&1 || {',
			"\techo 'Failed to install pandas'",
			'\texit 1',
			'}',
			"echo 'Installed pandas'",
		]);
	});

	it('renders optional installs as best effort', () => {
		expect(
			renderStep({ kind: 'ensure-packages', manager: 'apt', packages: ['gcc'], optional: true }),
		).toEqual([
			"echo 'Installing apt packages: gcc'",
			'apt-get update >/dev/null 2>&1 || true',
			'apt-get install -y gcc >/dev/null 2>&1 || true',
		]);
	});

	it('installs global npm packages without a local package.json', () => {
		expect(
			renderStep({
				kind: 'ensure-packages',
				manager: 'npm',
				packages: ['@codesandbox/sdk'],
				global: true,
			}),
		).toEqual([
			"echo 'Installing npm packages: @codesandbox/sdk'",
			'npm install -g @codesandbox/sdk >/dev/null 2>&1 || {',
			"\techo 'Failed to install @codesandbox/sdk'",
			'\texit 1',
			'}',
			"echo 'Installed @codesandbox/sdk'",
		]);
	});

	it('renders environment requirements with hints', () => {
		expect(
			renderStep({ kind: 'require-env', name: 'CSB_API_KEY', hint: ['Create a key first'] }),
		).toEqual([
			'if [ -z "$CSB_API_KEY" ]; then',
			"\techo 'Error: CSB_API_KEY is not set'",
			"\techo 'Create a key first'",
			'\texit 1',
			'fi',
		]);
	});

	it('renders command requirements with hints', () => {
		expect(
			renderStep({ kind: 'require-command', command: 'script-runner', hint: ['Use the tool image'] }),
		).toEqual([
			'if ! command -v script-runner >/dev/null 2>&1; then',
			"\techo 'Error: script-runner is not installed'",
			"\techo 'Use the tool image'",
			'\texit 1',
			'fi',
		]);
	});

	it('renders argument defaults', () => {
		expect(renderStep({ kind: 'set-default', arg: 'sandbox_name', value: 'python-script' })).toEqual([
			'if [ -z "$sandbox_name" ]; then sandbox_name=python-script; fi',
		]);
	});

	it('renders invocations with environment assignments', () => {
		expect(
			renderStep({
				kind: 'invoke',
				command: 'script-runner',
				args: ['sandbox', 'create', '--script', { arg: 'script_content' }],
				env: { SANDBOX_API_KEY: { env: 'CSB_API_KEY' } },
			}),
		).toEqual([
			'if SANDBOX_API_KEY="$CSB_API_KEY" script-runner sandbox create --script "$script_content"; then',
			"\techo 'script-runner finished successfully'",
			'else',
			"\techo 'script-runner failed'",
			'\texit 1',
			'fi',
		]);
	});

	it('renders file checks against argument paths', () => {
		expect(renderStep({ kind: 'require-file', path: { arg: 'script_path' } })).toEqual([
			'if [ ! -f "$script_path" ]; then',
			"\tprintf 'Error: file not found: %s\\n' \"$script_path\"",
			'\texit 1',
			'fi',
		]);
	});
});

describe('renderPayload', () => {
	it('groups consecutive steps that share a condition', () => {
		const steps: PayloadStep[] = [
			{ kind: 'announce', message: 'Starting' },
			{
				kind: 'write-file',
				path: '/tmp/s.py',
				content: { arg: 'script_content' },
				when: { present: 'script_content' },
			},
			{
				kind: 'invoke',
				command: 'python',
				args: ['/tmp/s.py'],
				when: { present: 'script_content' },
				onSuccess: 'Script executed successfully',
				onFailure: 'Script execution failed',
			},
			{ kind: 'announce', message: 'No script given', when: { absent: 'script_content' } },
		];

		expect(renderPayload(steps)).toBe(
			[
				'#!/usr/bin/env bash',
				'set -e',
				'',
				'echo Starting',
				'',
				'if [ -n "$script_content" ]; then',
				"\tprintf '%s\\n' \"$script_content\" > /tmp/s.py",
				'',
				'\tif python /tmp/s.py; then',
				"\t\techo 'Script executed successfully'",
				'\telse',
				"\t\techo 'Script execution failed'",
				'\t\texit 1',
				'\tfi',
				'fi',
				'',
				'if [ -z "$script_content" ]; then',
				"\techo 'No script given'",
				'fi',
				'',
			].join('\n'),
		);
	});

	it('is deterministic', () => {
		const steps: PayloadStep[] = [{ kind: 'remove-file', path: '/tmp/s.py' }];
		expect(renderPayload(steps)).toBe(renderPayload(steps));
		expect(renderPayload(steps)).toBe('#!/usr/bin/env bash\nset -e\n\nrm -f /tmp/s.py\n');
	});
});
