import crypto from "node:crypto";

function digest(value: string): Buffer {
	return crypto.createHash("sha256").update(value, "utf8").digest();
}

/**
 * Constant-time string comparison. Both sides are hashed first so the
 * buffers handed to timingSafeEqual always have the same length.
 */
export function safeEqual(a: string, b: string): boolean {
	return crypto.timingSafeEqual(digest(a), digest(b));
}

/**
 * Checks a presented header value against the expected admin token.
 * Repeated headers arrive as arrays and are never accepted.
 */
export function matchesAdminToken(provided: string | string[] | undefined, expected: string): boolean {
	if (typeof provided !== "string" || provided.length === 0) {
		return false;
	}
	return safeEqual(provided, expected);
}
