/**
 * Refresh coordinator: the single serialization point for the token lifecycle.
 *
 * Every mutation of the token record (refresh or code exchange) runs under one
 * mutex, so at most one vendor call is ever in flight. Concurrent refresh
 * requests share the in-flight attempt instead of queueing a second one.
 *
 * Commit-then-sync: the new record is persisted before anything is pushed to
 * the external config store, and a sync failure never rolls it back.
 */

import { InvalidCredentialError, type InvalidCredentialReason } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { ConfigSync } from "../sync/railway.js";
import { HOUR_MS, hoursBetween, toIso } from "../utils.js";
import type { VendorOAuthClient } from "../vendor/withings-client.js";
import type { TokenStore } from "./store.js";
import type { ClientCredentials, TokenRecord } from "./types.js";

const logger = getChildLogger({ module: "refresh-coordinator" });

export const DEFAULT_LOOK_AHEAD_MS = HOUR_MS;

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type CoordinatorState = "idle" | "refreshing" | "failed";

export type SyncOutcome =
	| { status: "synced"; variables: string[]; redeployed: boolean }
	| { status: "skipped"; reason: string }
	| { status: "failed"; message: string };

export type RefreshOptions = {
	/** Push the new pair to the external config store (default true). */
	sync?: boolean;
	/** Redeploy the consuming service after a successful push (default false). */
	redeploy?: boolean;
};

export type RefreshResult = {
	record: TokenRecord;
	sync: SyncOutcome;
};

export type TokenStatus = {
	configured: boolean;
	expiresAt: number | null;
	/** Signed: negative once the access token has expired. */
	expiresInHours: number | null;
	shouldRefresh: boolean;
	lastRefreshedAt: number | null;
	isExpired: boolean;
	state: CoordinatorState;
	failureReason: InvalidCredentialReason | null;
	lastError: string | null;
};

export interface RefreshCoordinatorOptions {
	store: TokenStore;
	vendor: VendorOAuthClient;
	credentials: ClientCredentials;
	redirectUri: string;
	/** Omitted when external sync is disabled. */
	sync?: ConfigSync;
	lookAheadMs?: number;
	/** Redeploy after syncs triggered by refreshIfDue(). */
	redeployOnScheduledRefresh?: boolean;
	now?: () => number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Mutex
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * FIFO async lock. Each critical section chains onto the previous one, and a
 * section that throws still releases the lock for the next.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();

	withLock<T>(fn: () => Promise<T> | T): Promise<T> {
		const section = this.tail.then(fn);
		this.tail = section.then(
			() => undefined,
			() => undefined,
		);
		return section;
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Coordinator
// ═══════════════════════════════════════════════════════════════════════════════

export class RefreshCoordinator {
	private readonly store: TokenStore;
	private readonly vendor: VendorOAuthClient;
	private readonly credentials: ClientCredentials;
	private readonly redirectUri: string;
	private readonly sync: ConfigSync | undefined;
	private readonly lookAheadMs: number;
	private readonly redeployOnScheduledRefresh: boolean;
	private readonly now: () => number;

	private readonly mutex = new Mutex();
	private inFlight: Promise<RefreshResult> | null = null;

	private state: CoordinatorState = "idle";
	private failure: InvalidCredentialError | null = null;
	private lastError: string | null = null;

	constructor(options: RefreshCoordinatorOptions) {
		this.store = options.store;
		this.vendor = options.vendor;
		this.credentials = options.credentials;
		this.redirectUri = options.redirectUri;
		this.sync = options.sync;
		this.lookAheadMs = options.lookAheadMs ?? DEFAULT_LOOK_AHEAD_MS;
		this.redeployOnScheduledRefresh = options.redeployOnScheduledRefresh ?? false;
		this.now = options.now ?? Date.now;
	}

	getState(): CoordinatorState {
		return this.state;
	}

	/**
	 * Due policy against the persisted record: a record exists and `now` is within
	 * the look-ahead window of its expiry.
	 */
	shouldRefresh(now: number = this.now()): boolean {
		const meta = this.store.describe();
		return meta !== null && this.isDue(meta.expiresAt, now);
	}

	/**
	 * Refresh unconditionally. Joins the in-flight attempt if there is one; the
	 * joiner's options are then ignored.
	 */
	async refresh(options: RefreshOptions = {}): Promise<RefreshResult> {
		const existing = this.inFlight;
		if (existing) {
			logger.debug("joining in-flight refresh");
			return existing;
		}
		return this.track(this.mutex.withLock(() => this.refreshLocked(options)));
	}

	/**
	 * Refresh only if the persisted record is due. Resolves to null when nothing
	 * was due (including when no record exists yet).
	 */
	async refreshIfDue(): Promise<RefreshResult | null> {
		const existing = this.inFlight;
		if (existing) {
			logger.debug("joining in-flight refresh");
			return existing;
		}

		return this.mutex.withLock(async () => {
			const meta = this.store.describe();
			const now = this.now();
			if (!meta || !this.isDue(meta.expiresAt, now)) {
				logger.debug(
					meta ? { expiresInHours: hoursBetween(now, meta.expiresAt) } : { configured: false },
					"token not due for refresh",
				);
				return null;
			}

			logger.info({ expiresAt: toIso(meta.expiresAt) }, "token inside look-ahead window; refreshing");
			return this.track(this.refreshLocked({ redeploy: this.redeployOnScheduledRefresh }));
		});
	}

	/**
	 * Exchange an authorization code for a fresh pair, overwrite the record and
	 * clear a prior `failed` state.
	 */
	async exchangeCode(code: string, options: { sync?: boolean } = {}): Promise<RefreshResult> {
		return this.mutex.withLock(async () => {
			// Metadata only: the old ciphertext may be unreadable after a key rotation
			const previous = this.store.describe();

			let issued: TokenRecord;
			try {
				issued = await this.vendor.exchangeCode({
					code,
					clientId: this.credentials.clientId,
					clientSecret: this.credentials.clientSecret,
					redirectUri: this.redirectUri,
				});
			} catch (err) {
				this.lastError = formatErrorSafe(err);
				logger.warn({ error: this.lastError }, "authorization code exchange failed");
				throw err;
			}

			const record = this.commit(issued, previous?.lastRefreshedAt);
			if (this.state === "failed") {
				logger.info("re-authorized; leaving failed state");
			}
			this.state = "idle";
			this.failure = null;
			this.lastError = null;

			logger.info(
				{ expiresAt: toIso(record.expiresAt), userId: record.userId },
				"authorization code exchanged",
			);

			const sync = await this.propagate(record, { sync: options.sync ?? true, redeploy: false });
			return { record, sync };
		});
	}

	getStatus(now: number = this.now()): TokenStatus {
		const meta = this.store.describe();
		const base = {
			state: this.state,
			failureReason: this.failure?.reason ?? null,
			lastError: this.lastError,
		};

		if (!meta) {
			return {
				...base,
				configured: false,
				expiresAt: null,
				expiresInHours: null,
				shouldRefresh: false,
				lastRefreshedAt: null,
				isExpired: false,
			};
		}

		return {
			...base,
			configured: true,
			expiresAt: meta.expiresAt,
			expiresInHours: hoursBetween(now, meta.expiresAt),
			shouldRefresh: this.isDue(meta.expiresAt, now),
			lastRefreshedAt: meta.lastRefreshedAt,
			isExpired: now >= meta.expiresAt,
		};
	}

	getAuthorizationUrl(state?: string): string {
		return this.vendor.buildAuthorizationUrl(this.credentials.clientId, this.redirectUri, state);
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Internals
	// ═══════════════════════════════════════════════════════════════════════════

	private isDue(expiresAt: number, now: number): boolean {
		return now >= expiresAt - this.lookAheadMs;
	}

	private track(attempt: Promise<RefreshResult>): Promise<RefreshResult> {
		this.inFlight = attempt;
		const clear = () => {
			if (this.inFlight === attempt) {
				this.inFlight = null;
			}
		};
		void attempt.then(clear, clear);
		return attempt;
	}

	/** Caller holds the mutex. */
	private async refreshLocked(options: RefreshOptions): Promise<RefreshResult> {
		if (this.state === "failed" && this.failure) {
			logger.error(
				{ reason: this.failure.reason },
				"refresh refused: credential was rejected; re-authorization required",
			);
			throw new InvalidCredentialError(
				`Refresh disabled until re-authorization: ${this.failure.message}`,
				this.failure.reason,
				this.failure.vendorStatus,
			);
		}

		const current = this.store.load();
		if (!current) {
			throw new InvalidCredentialError(
				"No token record stored; complete the authorization code exchange first",
				"not_authorized",
			);
		}

		this.state = "refreshing";
		let record: TokenRecord;
		try {
			const issued = await this.vendor.refresh({
				refreshToken: current.refreshToken,
				clientId: this.credentials.clientId,
				clientSecret: this.credentials.clientSecret,
			});
			// Vendor omits grant metadata on refresh; keep what the exchange recorded
			record = this.commit(
				{ ...issued, userId: issued.userId ?? current.userId, scope: issued.scope ?? current.scope },
				current.lastRefreshedAt,
			);
		} catch (err) {
			this.lastError = formatErrorSafe(err);
			if (err instanceof InvalidCredentialError) {
				this.state = "failed";
				this.failure = err;
				logger.error(
					{ reason: err.reason, vendorStatus: err.vendorStatus },
					"refresh token rejected; re-authorization required",
				);
			} else {
				this.state = "idle";
				logger.warn({ error: this.lastError }, "token refresh failed; record unchanged");
			}
			throw err;
		}

		this.state = "idle";
		this.lastError = null;
		logger.info({ expiresAt: toIso(record.expiresAt) }, "token refreshed");

		const sync = await this.propagate(record, {
			sync: options.sync ?? true,
			redeploy: options.redeploy ?? false,
		});
		return { record, sync };
	}

	/**
	 * Persist the vendor's pair as-is (the refresh token may have rotated), keeping
	 * `lastRefreshedAt` strictly increasing even if the wall clock stepped back.
	 */
	private commit(issued: TokenRecord, previousRefreshedAt: number | undefined): TokenRecord {
		const lastRefreshedAt =
			previousRefreshedAt === undefined
				? issued.lastRefreshedAt
				: Math.max(issued.lastRefreshedAt, previousRefreshedAt + 1);
		const record: TokenRecord = { ...issued, lastRefreshedAt };
		this.store.save(record);
		return record;
	}

	private async propagate(
		record: TokenRecord,
		options: Required<RefreshOptions>,
	): Promise<SyncOutcome> {
		if (!options.sync) {
			return { status: "skipped", reason: "sync not requested" };
		}
		if (!this.sync) {
			return { status: "skipped", reason: "sync disabled" };
		}
		if (!this.sync.isConfigured()) {
			const missing = this.sync.missingConfig();
			logger.debug({ missing }, "external sync not configured; skipping");
			return { status: "skipped", reason: `missing ${missing.join(", ")}` };
		}

		try {
			const pushed = await this.sync.push(record);
			if (!pushed.ok) {
				logger.warn({ error: pushed.error.message }, "token sync failed; stored record kept");
				return { status: "failed", message: pushed.error.message };
			}

			if (!options.redeploy) {
				return { status: "synced", variables: pushed.variables, redeployed: false };
			}

			const redeployed = await this.sync.redeploy();
			if (!redeployed.ok) {
				logger.warn({ error: redeployed.error.message }, "variables synced but redeploy failed");
				return { status: "failed", message: redeployed.error.message };
			}
			return { status: "synced", variables: pushed.variables, redeployed: true };
		} catch (err) {
			const message = formatErrorSafe(err);
			logger.warn({ error: message }, "token sync threw; stored record kept");
			return { status: "failed", message };
		}
	}
}
