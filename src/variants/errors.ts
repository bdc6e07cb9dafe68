/** The tool catalog could not be read or does not describe a valid set of tools. */
export class CatalogError extends Error {
	readonly source: string;

	constructor(message: string, source: string) {
		super(message);
		this.name = 'CatalogError';
		this.source = source;
	}
}
