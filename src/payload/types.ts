/**
 * A value used inside a payload step: a literal, a tool argument substituted by
 * the host runtime, or a variable from the execution environment.
 */
export type ValueSource = string | { arg: string } | { env: string };

/** Guards a step on whether an argument was supplied. */
export type StepCondition = { present: string } | { absent: string };

export type PackageManager = 'pip' | 'apt' | 'apk' | 'npm';

interface StepBase {
	when?: StepCondition;
}

export interface AnnounceStep extends StepBase {
	kind: 'announce';
	message: ValueSource;
}

export interface RequireEnvStep extends StepBase {
	kind: 'require-env';
	name: string;
	hint?: string[];
}

/** Fails the script with the hint lines when `command` is not on PATH. */
export interface RequireCommandStep extends StepBase {
	kind: 'require-command';
	command: string;
	hint?: string[];
}

export interface SetDefaultStep extends StepBase {
	kind: 'set-default';
	arg: string;
	value: string;
}

export interface EnsurePackagesStep extends StepBase {
	kind: 'ensure-packages';
	manager: PackageManager;
	packages: string[];
	/** Install failures are ignored instead of aborting the script. */
	optional?: boolean;
	/** npm only: install into the global prefix. */
	global?: boolean;
}

export interface WriteFileStep extends StepBase {
	kind: 'write-file';
	path: ValueSource;
	content: ValueSource;
}

export interface RequireFileStep extends StepBase {
	kind: 'require-file';
	path: ValueSource;
}

export interface RemoveFileStep extends StepBase {
	kind: 'remove-file';
	path: ValueSource;
}

export interface InvokeStep extends StepBase {
	kind: 'invoke';
	command: string;
	args?: ValueSource[];
	env?: Record<string, ValueSource>;
	onSuccess?: string;
	onFailure?: string;
}

export type PayloadStep =
	| AnnounceStep
	| RequireEnvStep
	| RequireCommandStep
	| SetDefaultStep
	| EnsurePackagesStep
	| WriteFileStep
	| RequireFileStep
	| RemoveFileStep
	| InvokeStep;

export type PayloadStepKind = PayloadStep['kind'];

export interface PayloadReferences {
	/** Tool argument names, in first-use order. */
	args: string[];
	/** Environment variable names, in first-use order. */
	env: string[];
}
