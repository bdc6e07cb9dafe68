import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadCatalog, parseCatalog } from '../catalog.js';
import { CatalogError } from '../errors.js';

describe('loadCatalog', () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'script-runner-catalog-'));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it('loads the bundled catalog', () => {
		const catalog = loadCatalog();
		expect(catalog.families.map((family) => family.name)).toEqual([
			'local-python',
			'sandbox-rest',
			'sandbox-sdk',
		]);
		expect(catalog.tools.map((tool) => tool.name)).toEqual([
			'python_script_runner',
			'create_codesandbox',
			'execute_codesandbox',
			'create_codesandbox_sdk',
			'execute_codesandbox_sdk',
		]);
	});

	it('fails for a missing file', () => {
		const path = join(dir, 'missing.yaml');
		expect(() => loadCatalog(path)).toThrow(new CatalogError(`Tool catalog not found: ${path}`, path));
	});

	it('fails for malformed YAML', () => {
		const path = join(dir, 'broken.yaml');
		writeFileSync(path, 'families: [unclosed\n');
		expect(() => loadCatalog(path)).toThrow(/^Failed to parse tool catalog at /);
	});

	it('applies record defaults', () => {
		const path = join(dir, 'tools.yaml');
		writeFileSync(
			path,
			[
				'families:',
				'  - name: basic',
				'    environment: alpine:3',
				'tools:',
				'  - name: hello',
				'    family: basic',
				'    description: Says hello',
				'    arguments:',
				'      - name: who',
				'        description: Who to greet',
				'    steps:',
				'      - kind: announce',
				'        message: { arg: who }',
				'',
			].join('\n'),
		);

		const catalog = loadCatalog(path);
		expect(catalog.version).toBe(1);
		expect(catalog.families[0]).toEqual({
			name: 'basic',
			environment: 'alpine:3',
			secrets: [],
			env: {},
			files: {},
			prelude: [],
		});
		expect(catalog.tools[0]?.deprecated).toBe(false);
		expect(catalog.tools[0]?.arguments).toEqual([
			{ name: 'who', description: 'Who to greet', required: false },
		]);
	});
});

describe('parseCatalog', () => {
	const family = { name: 'basic', environment: 'alpine:3' };
	const tool = {
		name: 'hello',
		family: 'basic',
		description: 'Says hello',
		steps: [{ kind: 'announce', message: 'hello' }],
	};

	it('rejects tools of unknown families', () => {
		expect(() =>
			parseCatalog({ families: [family], tools: [{ ...tool, family: 'other' }] }, 'inline'),
		).toThrow('Invalid tool catalog at inline: tools.0.family: Unknown family "other"');
	});

	it('rejects duplicate tool names', () => {
		expect(() => parseCatalog({ families: [family], tools: [tool, tool] }, 'inline')).toThrow(
			'Invalid tool catalog at inline: tools.1.name: Duplicate tool "hello"',
		);
	});

	it('rejects unknown step kinds', () => {
		expect(() =>
			parseCatalog(
				{ families: [family], tools: [{ ...tool, steps: [{ kind: 'reboot' }] }] },
				'inline',
			),
		).toThrow(CatalogError);
	});

	it('rejects a catalog without families', () => {
		expect(() => parseCatalog({ families: [] }, 'inline')).toThrow(CatalogError);
	});
});
