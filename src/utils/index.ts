export { createLogger, initLogger, type Logger, resetLogger } from './logger.js';
export {
	maskCredential,
	redactKnownValues,
	redactSecrets,
	redactSecretsInValue,
} from './secret-redaction.js';
