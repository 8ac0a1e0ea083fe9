import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidCredentialError, SyncError, TransientError } from "../../src/errors.js";
import { IN_MEMORY_DB, openDatabase } from "../../src/storage/db.js";
import type { ConfigSync } from "../../src/sync/railway.js";
import { AesGcmCipher } from "../../src/tokens/cipher.js";
import { Mutex, RefreshCoordinator, type RefreshCoordinatorOptions } from "../../src/tokens/coordinator.js";
import { SqliteTokenStore } from "../../src/tokens/store.js";
import type { TokenRecord } from "../../src/tokens/types.js";
import type { RefreshParams, VendorOAuthClient } from "../../src/vendor/withings-client.js";

// ═══════════════════════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

const SECRET = "test-secret-0123456789-abcdefghijklmnop";
const HOUR = 60 * 60 * 1000;
const T0 = 1_700_000_000_000;

type Deferred<T> = {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (err: unknown) => void;
};

function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (err: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

function seedRecord(overrides: Partial<TokenRecord> = {}): TokenRecord {
	return {
		accessToken: "access-0",
		refreshToken: "refresh-0",
		expiresAt: T0 + 3 * HOUR,
		lastRefreshedAt: T0 - HOUR,
		userId: "4242",
		scope: "user.metrics",
		...overrides,
	};
}

function createVendor(clock: { now: number }) {
	let issued = 0;
	const issue = (expiresInSeconds = 10800): TokenRecord => {
		issued++;
		return {
			accessToken: `access-${issued}`,
			refreshToken: `refresh-${issued}`,
			expiresAt: clock.now + expiresInSeconds * 1000,
			lastRefreshedAt: clock.now,
		};
	};

	const vendor = {
		buildAuthorizationUrl: vi.fn(
			(clientId: string, redirectUri: string, state?: string) =>
				`https://auth.example.test/?client_id=${clientId}&redirect_uri=${redirectUri}&state=${state ?? ""}`,
		),
		refresh: vi.fn(async (_params: RefreshParams) => issue()),
		exchangeCode: vi.fn(async (): Promise<TokenRecord> => ({ ...issue(), userId: "4242", scope: "user.metrics" })),
	} satisfies VendorOAuthClient;

	return { vendor, issue };
}

function createSync(overrides: Partial<ConfigSync> = {}) {
	const pushed: TokenRecord[] = [];
	const sync: ConfigSync = {
		push: vi.fn(async (record: TokenRecord) => {
			pushed.push(record);
			return { ok: true as const, variables: ["WITHINGS_ACCESS_TOKEN", "WITHINGS_REFRESH_TOKEN"] };
		}),
		redeploy: vi.fn(async () => ({ ok: true as const })),
		isConfigured: () => true,
		missingConfig: () => [],
		...overrides,
	};
	return { sync, pushed };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Suite
// ═══════════════════════════════════════════════════════════════════════════════

describe("RefreshCoordinator", () => {
	let db: Database.Database;
	let store: SqliteTokenStore;
	let clock: { now: number };

	beforeEach(() => {
		clock = { now: T0 };
		db = openDatabase(IN_MEMORY_DB);
		store = new SqliteTokenStore(db, new AesGcmCipher(SECRET), () => clock.now);
	});

	afterEach(() => {
		db.close();
	});

	function build(overrides: Partial<RefreshCoordinatorOptions> = {}) {
		const { vendor, issue } = createVendor(clock);
		const { sync, pushed } = createSync();
		const coordinator = new RefreshCoordinator({
			store,
			vendor,
			credentials: { clientId: "test-client", clientSecret: "test-secret" },
			redirectUri: "https://app.example.test/callback",
			sync,
			lookAheadMs: HOUR,
			now: () => clock.now,
			...overrides,
		});
		return { coordinator, vendor, sync, pushed, issue };
	}

	describe("due policy", () => {
		it("should not be due without a record", () => {
			const { coordinator } = build();
			expect(coordinator.shouldRefresh()).toBe(false);
		});

		it("should be due exactly inside the look-ahead window", () => {
			store.save(seedRecord({ expiresAt: T0 + 2 * HOUR }));
			const { coordinator } = build();

			expect(coordinator.shouldRefresh(T0)).toBe(false);
			expect(coordinator.shouldRefresh(T0 + HOUR - 1)).toBe(false);
			expect(coordinator.shouldRefresh(T0 + HOUR)).toBe(true);
			expect(coordinator.shouldRefresh(T0 + 3 * HOUR)).toBe(true);
		});

		it("should skip the vendor when refreshIfDue finds nothing due", async () => {
			store.save(seedRecord({ expiresAt: T0 + 5 * HOUR }));
			const { coordinator, vendor } = build();

			await expect(coordinator.refreshIfDue()).resolves.toBeNull();
			expect(vendor.refresh).not.toHaveBeenCalled();
		});

		it("should treat a missing record as not due", async () => {
			const { coordinator, vendor } = build();

			await expect(coordinator.refreshIfDue()).resolves.toBeNull();
			expect(vendor.refresh).not.toHaveBeenCalled();
		});
	});

	describe("refresh", () => {
		it("should persist the rotated pair and sync it", async () => {
			store.save(seedRecord());
			const { coordinator, vendor, pushed } = build();

			const result = await coordinator.refresh();

			expect(vendor.refresh).toHaveBeenCalledWith({
				refreshToken: "refresh-0",
				clientId: "test-client",
				clientSecret: "test-secret",
			});
			expect(result.sync).toEqual({
				status: "synced",
				variables: ["WITHINGS_ACCESS_TOKEN", "WITHINGS_REFRESH_TOKEN"],
				redeployed: false,
			});
			expect(store.load()).toEqual({
				accessToken: "access-1",
				refreshToken: "refresh-1",
				expiresAt: T0 + 10_800_000,
				lastRefreshedAt: T0,
				userId: "4242",
				scope: "user.metrics",
			});
			expect(pushed).toEqual([result.record]);
			expect(coordinator.getState()).toBe("idle");
		});

		it("should use the latest refresh token on consecutive refreshes", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();

			await coordinator.refresh();
			clock.now += 1000;
			await coordinator.refresh();

			expect(vendor.refresh).toHaveBeenCalledTimes(2);
			expect(vendor.refresh.mock.calls[1][0].refreshToken).toBe("refresh-1");
			expect(store.load()?.refreshToken).toBe("refresh-2");
		});

		it("should refuse to refresh before the first exchange", async () => {
			const { coordinator, vendor } = build();

			const err = await coordinator.refresh().catch((e: unknown) => e);

			expect(err).toBeInstanceOf(InvalidCredentialError);
			expect(err).toMatchObject({ reason: "not_authorized" });
			expect(vendor.refresh).not.toHaveBeenCalled();
			expect(coordinator.getState()).toBe("idle");
		});

		it("should keep lastRefreshedAt strictly increasing when the clock steps back", async () => {
			store.save(seedRecord({ lastRefreshedAt: T0 + 5000 }));
			const { coordinator } = build();

			const { record } = await coordinator.refresh();

			expect(record.lastRefreshedAt).toBe(T0 + 5001);
			expect(store.describe()?.lastRefreshedAt).toBe(T0 + 5001);
		});
	});

	describe("mutual exclusion", () => {
		it("should issue one vendor call for concurrent refresh requests", async () => {
			store.save(seedRecord({ expiresAt: T0 + 10 * 60 * 1000 }));
			const { coordinator, vendor, issue } = build();

			const gate = deferred<TokenRecord>();
			let active = 0;
			let maxActive = 0;
			vendor.refresh.mockImplementation(async () => {
				active++;
				maxActive = Math.max(maxActive, active);
				try {
					return await gate.promise;
				} finally {
					active--;
				}
			});

			const first = coordinator.refresh();
			const second = coordinator.refresh({ sync: false });
			const third = coordinator.refreshIfDue();
			await Promise.resolve();
			const fourth = coordinator.refresh({ redeploy: true });

			gate.resolve(issue());
			const results = await Promise.all([first, second, third, fourth]);

			expect(vendor.refresh).toHaveBeenCalledTimes(1);
			expect(maxActive).toBe(1);
			for (const result of results) {
				expect(result).toBe(results[0]);
			}
			expect(coordinator.getState()).toBe("idle");
		});

		it("should serialize an exchange behind an in-flight refresh", async () => {
			store.save(seedRecord());
			const { coordinator, vendor, issue } = build();

			const gate = deferred<TokenRecord>();
			const order: string[] = [];
			vendor.refresh.mockImplementation(async () => {
				order.push("refresh:start");
				const record = await gate.promise;
				order.push("refresh:end");
				return record;
			});
			vendor.exchangeCode.mockImplementation(async () => {
				order.push("exchange");
				return issue();
			});

			const refreshing = coordinator.refresh();
			const exchanging = coordinator.exchangeCode("auth-code");
			await Promise.resolve();
			gate.resolve(issue());
			await Promise.all([refreshing, exchanging]);

			expect(order).toEqual(["refresh:start", "refresh:end", "exchange"]);
			expect(store.load()?.refreshToken).toBe("refresh-2");
		});

		it("should start a new attempt once the previous one settled", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();

			await coordinator.refresh();
			await coordinator.refresh();

			expect(vendor.refresh).toHaveBeenCalledTimes(2);
		});
	});

	describe("failure handling", () => {
		it("should enter failed on a rejected refresh token and keep the stale record", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();
			vendor.refresh.mockRejectedValueOnce(
				new InvalidCredentialError("Refresh token rejected", "invalid_refresh_token", 401),
			);

			await expect(coordinator.refresh()).rejects.toBeInstanceOf(InvalidCredentialError);

			const status = coordinator.getStatus();
			expect(status.state).toBe("failed");
			expect(status.failureReason).toBe("invalid_refresh_token");
			expect(status.expiresAt).toBe(T0 + 3 * HOUR);
			expect(store.load()?.refreshToken).toBe("refresh-0");
		});

		it("should refuse further refreshes without calling the vendor while failed", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();
			vendor.refresh.mockRejectedValueOnce(
				new InvalidCredentialError("Refresh token rejected", "invalid_refresh_token", 401),
			);
			await coordinator.refresh().catch(() => undefined);

			const err = await coordinator.refresh().catch((e: unknown) => e);

			expect(err).toBeInstanceOf(InvalidCredentialError);
			expect(err).toMatchObject({ reason: "invalid_refresh_token", vendorStatus: 401 });
			expect(vendor.refresh).toHaveBeenCalledTimes(1);
		});

		it("should leave failed after a successful exchange", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();
			vendor.refresh.mockRejectedValueOnce(
				new InvalidCredentialError("Refresh token rejected", "invalid_refresh_token", 401),
			);
			await coordinator.refresh().catch(() => undefined);

			await coordinator.exchangeCode("fresh-code");
			expect(coordinator.getState()).toBe("idle");
			expect(coordinator.getStatus().failureReason).toBeNull();

			await coordinator.refresh();
			expect(vendor.refresh).toHaveBeenCalledTimes(2);
		});

		it("should stay idle on a transient failure and leave the store untouched", async () => {
			store.save(seedRecord());
			const { coordinator, vendor } = build();
			vendor.refresh.mockRejectedValueOnce(new TransientError("fetch timed out after 30000ms"));

			await expect(coordinator.refresh()).rejects.toBeInstanceOf(TransientError);

			expect(coordinator.getState()).toBe("idle");
			expect(coordinator.getStatus().lastError).toBe("TransientError: fetch timed out after 30000ms");
			expect(store.load()).toEqual(seedRecord());

			await coordinator.refresh();
			expect(vendor.refresh).toHaveBeenCalledTimes(2);
			expect(coordinator.getStatus().lastError).toBeNull();
		});

		it("should leave the store unchanged when the vendor rejects an authorization code", async () => {
			const { coordinator, vendor } = build();
			vendor.exchangeCode.mockRejectedValueOnce(
				new InvalidCredentialError("Authorization code rejected", "invalid_code", 29),
			);

			await expect(coordinator.exchangeCode("stale-code")).rejects.toMatchObject({
				reason: "invalid_code",
			});
			expect(store.load()).toBeNull();
			expect(coordinator.getState()).toBe("idle");
		});
	});

	describe("external sync", () => {
		it("should keep the new record when the sync push fails", async () => {
			store.save(seedRecord());
			const { sync } = createSync({
				push: vi.fn(async () => ({ ok: false as const, error: new SyncError("Railway API error: forbidden") })),
			});
			const { coordinator } = build({ sync });

			const result = await coordinator.refresh();

			expect(result.sync).toEqual({ status: "failed", message: "Railway API error: forbidden" });
			expect(store.load()?.refreshToken).toBe("refresh-1");
			expect(coordinator.getState()).toBe("idle");
		});

		it("should report a throwing sync as failed", async () => {
			store.save(seedRecord());
			const { sync } = createSync({
				push: vi.fn(async () => {
					throw new Error("boom");
				}),
			});
			const { coordinator } = build({ sync });

			const result = await coordinator.refresh();

			expect(result.sync).toEqual({ status: "failed", message: "Error: boom" });
			expect(store.load()?.refreshToken).toBe("refresh-1");
		});

		it("should skip the push when sync is not requested", async () => {
			store.save(seedRecord());
			const { coordinator, sync } = build();

			const result = await coordinator.refresh({ sync: false });

			expect(result.sync).toEqual({ status: "skipped", reason: "sync not requested" });
			expect(sync.push).not.toHaveBeenCalled();
		});

		it("should skip the push when sync is disabled or unconfigured", async () => {
			store.save(seedRecord());
			const disabled = build({ sync: undefined });
			expect((await disabled.coordinator.refresh()).sync).toEqual({
				status: "skipped",
				reason: "sync disabled",
			});

			const { sync } = createSync({
				isConfigured: () => false,
				missingConfig: () => ["RAILWAY_API_TOKEN", "RAILWAY_SERVICE_ID"],
			});
			const unconfigured = build({ sync });
			expect((await unconfigured.coordinator.refresh()).sync).toEqual({
				status: "skipped",
				reason: "missing RAILWAY_API_TOKEN, RAILWAY_SERVICE_ID",
			});
			expect(sync.push).not.toHaveBeenCalled();
		});

		it("should redeploy after a successful push when asked", async () => {
			store.save(seedRecord());
			const { coordinator, sync } = build();

			const result = await coordinator.refresh({ redeploy: true });

			expect(sync.redeploy).toHaveBeenCalledTimes(1);
			expect(result.sync).toMatchObject({ status: "synced", redeployed: true });
		});

		it("should report a failed redeploy without touching the record", async () => {
			store.save(seedRecord());
			const { sync } = createSync({
				redeploy: vi.fn(async () => ({ ok: false as const, error: new SyncError("Railway redeploy failed") })),
			});
			const { coordinator } = build({ sync });

			const result = await coordinator.refresh({ redeploy: true });

			expect(result.sync).toEqual({ status: "failed", message: "Railway redeploy failed" });
			expect(store.load()?.refreshToken).toBe("refresh-1");
		});

		it("should redeploy on scheduled refreshes when configured to", async () => {
			store.save(seedRecord({ expiresAt: T0 + 30 * 60 * 1000 }));
			const { coordinator, sync } = build({ redeployOnScheduledRefresh: true });

			const result = await coordinator.refreshIfDue();

			expect(result?.sync).toMatchObject({ status: "synced", redeployed: true });
			expect(sync.redeploy).toHaveBeenCalledTimes(1);
		});

		it("should sync after an exchange unless told not to", async () => {
			const { coordinator, sync, pushed } = build();

			await coordinator.exchangeCode("code-1");
			expect(pushed).toHaveLength(1);

			const result = await coordinator.exchangeCode("code-2", { sync: false });
			expect(result.sync).toEqual({ status: "skipped", reason: "sync not requested" });
			expect(sync.push).toHaveBeenCalledTimes(1);
		});
	});

	describe("status", () => {
		it("should report an unconfigured deployment", () => {
			const { coordinator } = build();

			expect(coordinator.getStatus()).toEqual({
				configured: false,
				expiresAt: null,
				expiresInHours: null,
				shouldRefresh: false,
				lastRefreshedAt: null,
				isExpired: false,
				state: "idle",
				failureReason: null,
				lastError: null,
			});
		});

		it("should report signed hours until expiry", () => {
			store.save(seedRecord({ expiresAt: T0 + 90 * 60 * 1000 }));
			const { coordinator } = build();

			expect(coordinator.getStatus(T0)).toMatchObject({
				configured: true,
				expiresInHours: 1.5,
				shouldRefresh: false,
				isExpired: false,
			});
			expect(coordinator.getStatus(T0 + 2 * HOUR)).toMatchObject({
				expiresInHours: -0.5,
				shouldRefresh: true,
				isExpired: true,
			});
		});

		it("should build the authorization URL from the configured credentials", () => {
			const { coordinator, vendor } = build();

			coordinator.getAuthorizationUrl("state-1");

			expect(vendor.buildAuthorizationUrl).toHaveBeenCalledWith(
				"test-client",
				"https://app.example.test/callback",
				"state-1",
			);
		});
	});

	describe("long look-ahead scenario", () => {
		it("should refresh an hour-old token under a 24h look-ahead and land far outside the window", async () => {
			store.save(seedRecord({ expiresAt: T0 + HOUR }));
			const { coordinator, vendor, issue } = build({ lookAheadMs: 24 * HOUR });
			vendor.refresh.mockImplementation(async () => {
				clock.now += 750;
				return issue(1_209_600);
			});

			expect(coordinator.shouldRefresh()).toBe(true);

			const result = await coordinator.refreshIfDue();

			expect(result?.record.expiresAt).toBe(T0 + 750 + 1_209_600_000);
			expect(store.describe()?.expiresAt).toBe(T0 + 750 + 1_209_600_000);
			expect(coordinator.shouldRefresh()).toBe(false);
			await expect(coordinator.refreshIfDue()).resolves.toBeNull();
			expect(vendor.refresh).toHaveBeenCalledTimes(1);
		});
	});
});

describe("Mutex", () => {
	it("should run sections one at a time in arrival order", async () => {
		const mutex = new Mutex();
		const gate = deferred<void>();
		const events: string[] = [];

		const first = mutex.withLock(async () => {
			events.push("first:start");
			await gate.promise;
			events.push("first:end");
		});
		const second = mutex.withLock(() => {
			events.push("second");
		});

		await Promise.resolve();
		await Promise.resolve();
		expect(events).toEqual(["first:start"]);

		gate.resolve();
		await Promise.all([first, second]);
		expect(events).toEqual(["first:start", "first:end", "second"]);
	});

	it("should release the lock when a section throws", async () => {
		const mutex = new Mutex();

		await expect(
			mutex.withLock(() => {
				throw new Error("vendor exploded");
			}),
		).rejects.toThrow("vendor exploded");
		await expect(mutex.withLock(() => "next")).resolves.toBe("next");
	});
});
