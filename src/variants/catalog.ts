import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { createLogger } from '../utils/logger.js';
import { CatalogError } from './errors.js';
import { CatalogSchema, type ToolCatalog } from './schema.js';

const logger = createLogger('variants:catalog');

/** The catalog shipped with the package, next to `src/` and `dist/`. */
export function getDefaultCatalogPath(): string {
	return fileURLToPath(new URL('../../catalog/tools.yaml', import.meta.url));
}

export function parseCatalog(raw: unknown, source: string): ToolCatalog {
	const parsed = CatalogSchema.safeParse(raw);
	if (!parsed.success) {
		const message = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new CatalogError(`Invalid tool catalog at ${source}: ${message}`, source);
	}
	return parsed.data;
}

export function loadCatalog(path: string = getDefaultCatalogPath()): ToolCatalog {
	if (!existsSync(path)) {
		throw new CatalogError(`Tool catalog not found: ${path}`, path);
	}

	let raw: unknown;
	try {
		raw = parseYaml(readFileSync(path, 'utf-8'));
	} catch (error) {
		throw new CatalogError(
			`Failed to parse tool catalog at ${path}: ${error instanceof Error ? error.message : String(error)}`,
			path,
		);
	}

	const catalog = parseCatalog(raw, path);
	logger.debug('Catalog loaded', {
		path,
		families: catalog.families.length,
		tools: catalog.tools.length,
	});
	return catalog;
}
