/**
 * Rendering of secret values for logs and API responses.
 * Only a fixed-length trailing suffix is ever revealed.
 */

export const MASK_MARKER = "****";
export const MASK_SUFFIX_LENGTH = 4;

// Anything this short would be mostly revealed by the suffix
const MIN_REVEAL_LENGTH = 2 * MASK_SUFFIX_LENGTH;

export function maskSecret(value: string | null | undefined): string {
	if (!value) return "[NONE]";
	if (value.length <= MIN_REVEAL_LENGTH) return "[MASKED]";
	return `${MASK_MARKER}${value.slice(-MASK_SUFFIX_LENGTH)}`;
}

/**
 * pino `redact.censor` callback: masks string values, fully hides anything else.
 */
export function censorSecret(value: unknown): string {
	return typeof value === "string" ? maskSecret(value) : "[MASKED]";
}
