const REDACTED_VALUE = '[REDACTED]';

const BEARER_TOKEN_PATTERN = /\b(Bearer\s+)([A-Za-z0-9\-._~+/]+=*)/gi;
const GENERIC_SECRET_FIELD_NAME =
	'[A-Za-z_][A-Za-z0-9_]*(?:TOKEN|SECRET|PASSWORD|API_KEY|API|ACCESS_KEY|AUTHORIZATION|CREDENTIALS?)';
const SECRET_ENV_ASSIGNMENT_PATTERN = new RegExp(
	`\\b(${GENERIC_SECRET_FIELD_NAME})\\s*=\\s*("([^"\\\\]|\\\\.)*"|'([^'\\\\]|\\\\.)*'|[^\\s]+)`,
	'g',
);
const KNOWN_SECRET_PREFIX_PATTERNS = [
	/\bcsb_v1_[A-Za-z0-9_-]{16,}/g,
	/\bsk-[A-Za-z0-9]{16,}\b/g,
	/\bgh[pousr]_[A-Za-z0-9]{20,}\b/g,
	/\bAKIA[0-9A-Z]{16}\b/g,
];

/**
 * Masks credentials in free text: `NAME_API_KEY=value` assignments, bearer
 * tokens and well-known key prefixes.
 */
export function redactSecrets(text: string): string {
	let redacted = text.replace(SECRET_ENV_ASSIGNMENT_PATTERN, (_match, key: string) => {
		return `${key}=${REDACTED_VALUE}`;
	});
	redacted = redacted.replace(BEARER_TOKEN_PATTERN, (_match, prefix: string) => {
		return `${prefix}${REDACTED_VALUE}`;
	});
	for (const pattern of KNOWN_SECRET_PREFIX_PATTERNS) {
		redacted = redacted.replace(pattern, REDACTED_VALUE);
	}
	return redacted;
}

export function redactSecretsInValue(value: unknown): unknown {
	if (typeof value === 'string') {
		return redactSecrets(value);
	}

	if (Array.isArray(value)) {
		return value.map((item) => redactSecretsInValue(item));
	}

	if (!value || typeof value !== 'object') {
		return value;
	}

	const proto = Object.getPrototypeOf(value);
	if (proto !== Object.prototype && proto !== null) {
		return value;
	}

	const result: Record<string, unknown> = {};
	for (const [key, item] of Object.entries(value)) {
		result[key] = redactSecretsInValue(item);
	}
	return result;
}

/**
 * Masks every occurrence of the given literal secret values, e.g. the API key
 * a command was run with.
 */
export function redactKnownValues(text: string, values: readonly string[]): string {
	let redacted = text;
	for (const value of values) {
		if (value.length < 4) continue;
		redacted = redacted.split(value).join(REDACTED_VALUE);
	}
	return redacted;
}

/**
 * Shows only the last four characters of a credential, as in `****abcd`.
 */
export function maskCredential(value: string): string {
	if (value.length === 0) return 'Not configured';
	return `****${value.slice(-4)}`;
}
