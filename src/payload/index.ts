export { collectReferences, isShellIdentifier } from './references.js';
export { quoteShell, renderPayload, renderStep, renderValue } from './render.js';
export type {
	AnnounceStep,
	EnsurePackagesStep,
	InvokeStep,
	PackageManager,
	PayloadReferences,
	PayloadStep,
	PayloadStepKind,
	RemoveFileStep,
	RequireCommandStep,
	RequireEnvStep,
	RequireFileStep,
	SetDefaultStep,
	StepCondition,
	ValueSource,
	WriteFileStep,
} from './types.js';
