/**
 * Error taxonomy for the token lifecycle.
 *
 * - configuration: missing/malformed secret or credentials (fatal at startup)
 * - invalid_credential: vendor rejected the code or refresh token (re-authorize)
 * - transient: network/timeout/vendor hiccup (safe to retry)
 * - sync: external config propagation failed (non-fatal)
 */

export type ErrorKind = "configuration" | "invalid_credential" | "transient" | "sync";

export abstract class VitalsyncError extends Error {
	abstract readonly kind: ErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigurationError extends VitalsyncError {
	readonly kind = "configuration";
}

export type InvalidCredentialReason = "invalid_code" | "invalid_refresh_token" | "not_authorized";

export class InvalidCredentialError extends VitalsyncError {
	readonly kind = "invalid_credential";

	constructor(
		message: string,
		public readonly reason: InvalidCredentialReason,
		public readonly vendorStatus?: number,
	) {
		super(message);
	}
}

export class TransientError extends VitalsyncError {
	readonly kind = "transient";
	readonly vendorStatus?: number;

	constructor(message: string, options?: { cause?: unknown; vendorStatus?: number }) {
		super(message, { cause: options?.cause });
		this.vendorStatus = options?.vendorStatus;
	}
}

export class SyncError extends VitalsyncError {
	readonly kind = "sync";
}

export function isVitalsyncError(err: unknown): err is VitalsyncError {
	return err instanceof VitalsyncError;
}
