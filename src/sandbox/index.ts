export {
	SandboxAuthError,
	SandboxError,
	SandboxRequestError,
	SandboxUnsupportedError,
} from './errors.js';
export {
	openSandboxProvider,
	type OpenSandboxProviderOptions,
	readSandboxApiKey,
	SANDBOX_API_KEY_ENV,
} from './providers.js';
export { createRestSandboxProvider, type RestSandboxProviderOptions } from './rest-provider.js';
export {
	createSdkSandboxProvider,
	loadSdkClient,
	type SdkClient,
	type SdkSandbox,
	type SdkSandboxProviderOptions,
	type SdkSession,
} from './sdk-provider.js';
export {
	createSessionStore,
	sanitizeSessionName,
	type SessionRecord,
	type SessionStore,
} from './session-store.js';
export {
	type CreatedSandboxSession,
	type CreateSandboxSessionOptions,
	createSandboxSession,
	DEFAULT_CREATE_NAME,
	DEFAULT_EXECUTE_NAME,
	defaultSandboxFiles,
	type ExecuteSandboxScriptOptions,
	executeSandboxScript,
	type SandboxExecution,
} from './sessions.js';
export type {
	CreateSandboxRequest,
	RunOptions,
	SandboxBackend,
	SandboxHandle,
	SandboxInfo,
	SandboxPrivacy,
	SandboxProvider,
} from './types.js';
