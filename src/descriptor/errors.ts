/**
 * Raised while building an argument schema or a tool descriptor. These are
 * programming errors in a tool definition, never caller input problems.
 */
export class DescriptorDefinitionError extends Error {
	readonly toolName: string | undefined;

	constructor(message: string, toolName?: string) {
		super(toolName ? `Invalid tool "${toolName}": ${message}` : message);
		this.name = 'DescriptorDefinitionError';
		this.toolName = toolName;
	}
}
