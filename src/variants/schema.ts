import { z } from 'zod';

const ValueSourceSchema = z.union([
	z.string(),
	z.object({ arg: z.string().min(1) }).strict(),
	z.object({ env: z.string().min(1) }).strict(),
]);

const ConditionSchema = z.union([
	z.object({ present: z.string().min(1) }).strict(),
	z.object({ absent: z.string().min(1) }).strict(),
]);

const when = ConditionSchema.optional();

export const StepSchema = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('announce'), when, message: ValueSourceSchema }).strict(),
	z
		.object({
			kind: z.literal('require-env'),
			when,
			name: z.string().min(1),
			hint: z.array(z.string()).optional(),
		})
		.strict(),
	z
		.object({
			kind: z.literal('require-command'),
			when,
			command: z.string().min(1),
			hint: z.array(z.string()).optional(),
		})
		.strict(),
	z
		.object({ kind: z.literal('set-default'), when, arg: z.string().min(1), value: z.string() })
		.strict(),
	z
		.object({
			kind: z.literal('ensure-packages'),
			when,
			manager: z.enum(['pip', 'apt', 'apk', 'npm']),
			packages: z.array(z.string().min(1)).min(1),
			optional: z.boolean().optional(),
			global: z.boolean().optional(),
		})
		.strict(),
	z
		.object({
			kind: z.literal('write-file'),
			when,
			path: ValueSourceSchema,
			content: ValueSourceSchema,
		})
		.strict(),
	z.object({ kind: z.literal('require-file'), when, path: ValueSourceSchema }).strict(),
	z.object({ kind: z.literal('remove-file'), when, path: ValueSourceSchema }).strict(),
	z
		.object({
			kind: z.literal('invoke'),
			when,
			command: z.string().min(1),
			args: z.array(ValueSourceSchema).optional(),
			env: z.record(ValueSourceSchema).optional(),
			onSuccess: z.string().optional(),
			onFailure: z.string().optional(),
		})
		.strict(),
]);

const ArgumentRecordSchema = z.object({
	name: z.string().min(1),
	description: z.string().min(1),
	required: z.boolean().default(false),
	group: z.string().min(1).optional(),
});

export const FamilyRecordSchema = z.object({
	name: z.string().min(1),
	description: z.string().optional(),
	environment: z.string().min(1),
	iconUrl: z.string().url().optional(),
	secrets: z.array(z.string().min(1)).default([]),
	env: z.record(z.string()).default({}),
	files: z.record(z.string()).default({}),
	prelude: z.array(StepSchema).default([]),
});

export const ToolRecordSchema = z.object({
	name: z.string().min(1),
	description: z.string().min(1),
	family: z.string().min(1),
	deprecated: z.boolean().default(false),
	arguments: z.array(ArgumentRecordSchema).default([]),
	steps: z.array(StepSchema).min(1),
});

export const CatalogSchema = z
	.object({
		version: z.number().int().default(1),
		families: z.array(FamilyRecordSchema).min(1),
		tools: z.array(ToolRecordSchema).default([]),
	})
	.superRefine((catalog, ctx) => {
		const families = new Set<string>();
		catalog.families.forEach((family, index) => {
			if (families.has(family.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['families', index, 'name'],
					message: `Duplicate family "${family.name}"`,
				});
			}
			families.add(family.name);
		});

		const tools = new Set<string>();
		catalog.tools.forEach((tool, index) => {
			if (tools.has(tool.name)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['tools', index, 'name'],
					message: `Duplicate tool "${tool.name}"`,
				});
			}
			tools.add(tool.name);
			if (!families.has(tool.family)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['tools', index, 'family'],
					message: `Unknown family "${tool.family}"`,
				});
			}
		});
	});

export type FamilyRecord = z.infer<typeof FamilyRecordSchema>;
export type ToolRecord = z.infer<typeof ToolRecordSchema>;
export type ToolCatalog = z.infer<typeof CatalogSchema>;
