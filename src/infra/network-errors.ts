/**
 * Inspection and formatting of errors raised by outbound calls (vendor token
 * endpoint, Railway API).
 *
 * A fetch failure usually arrives wrapped: `TypeError("fetch failed")` with the
 * socket error in `.cause`. Classification looks through the whole chain.
 */

import { isVitalsyncError } from "../errors.js";

const TRANSIENT_CODES: ReadonlySet<string> = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGES = [
	"fetch failed",
	"network error",
	"socket hang up",
	"other side closed",
	"client network socket disconnected",
	"timed out after",
];

const URL_PATTERN = /https?:\/\/[^\s]+/g;

// Token material echoed back in form bodies or JSON payloads.
const SECRET_FIELD_PATTERN = /("?(?:access_token|refresh_token|client_secret)"?\s*[:=]\s*"?)[^\s"&,}]+/gi;

function field(value: object, key: string): unknown {
	return key in value ? Reflect.get(value, key) : undefined;
}

function messageOf(value: unknown): string | null {
	if (typeof value === "string") return value;
	if (typeof value === "object" && value !== null) {
		const message = field(value, "message");
		if (typeof message === "string") return message;
	}
	return null;
}

/**
 * Yields the error followed by everything reachable through `cause`, `reason`
 * and `errors`, breadth first. Each object is visited once.
 */
export function* walkErrorChain(err: unknown, maxDepth = 5): Generator<unknown> {
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	for (let item = queue.shift(); item; item = queue.shift()) {
		const { value, depth } = item;
		if (value == null || depth > maxDepth) continue;
		if (typeof value !== "object") {
			yield value;
			continue;
		}
		if (seen.has(value)) continue;
		seen.add(value);
		yield value;

		const children: unknown[] = [field(value, "cause"), field(value, "reason")];
		const errors = field(value, "errors");
		if (Array.isArray(errors)) children.push(...errors);

		for (const child of children) {
			if (child != null) queue.push({ value: child, depth: depth + 1 });
		}
	}
}

function looksTransient(candidate: unknown): boolean {
	if (typeof candidate === "object" && candidate !== null) {
		const code = field(candidate, "code");
		if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;

		// A request we gave up on may be retried.
		const name = field(candidate, "name");
		if (name === "TimeoutError" || name === "AbortError") return true;
	}

	const message = messageOf(candidate)?.toLowerCase();
	return message !== undefined && TRANSIENT_MESSAGES.some((pattern) => message.includes(pattern));
}

export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of walkErrorChain(err)) {
		if (looksTransient(candidate)) return true;
	}
	return false;
}

/**
 * AbortError anywhere in the chain. Expected while shutting down.
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of walkErrorChain(err)) {
		if (typeof candidate !== "object" || candidate === null) continue;
		if (field(candidate, "name") === "AbortError" || field(candidate, "code") === "ABORT_ERR") {
			return true;
		}
	}
	return false;
}

export function isConfigurationError(err: unknown): boolean {
	return isVitalsyncError(err) && err.kind === "configuration";
}

/**
 * Replaces URLs and token-bearing fields with placeholders.
 */
export function redactSecrets(text: string): string {
	return text.replace(URL_PATTERN, "[URL]").replace(SECRET_FIELD_PATTERN, "$1[REDACTED]");
}

/**
 * One-line, log-safe rendering of an error and its causes.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	let text: string;
	try {
		if (err instanceof Error) {
			text = `${err.name}: ${err.message}`;
			if (err.cause) {
				text += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
		} else {
			text = String(err);
		}
	} catch {
		return "error (could not format)";
	}

	const redacted = redactSecrets(text);
	return redacted.length <= maxLength ? redacted : `${redacted.slice(0, maxLength - 3)}...`;
}
