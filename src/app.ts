/**
 * Composition root: wires store, vendor client, sync and coordinator from
 * config + env. Nothing here is a module-level singleton; each call builds an
 * independent graph that owns its own database handle.
 */

import type Database from "better-sqlite3";

import type { ConfigSummary } from "./admin/server.js";
import type { VitalsyncConfig } from "./config/config.js";
import type { VitalsyncEnv } from "./env.js";
import { getChildLogger } from "./logging.js";
import { openDatabase, resolveDbPath } from "./storage/db.js";
import { type ConfigSync, RailwayConfigSync } from "./sync/railway.js";
import { AesGcmCipher } from "./tokens/cipher.js";
import { RefreshCoordinator } from "./tokens/coordinator.js";
import { SqliteTokenStore, type TokenStore } from "./tokens/store.js";
import { type VendorOAuthClient, WithingsOAuthClient } from "./vendor/withings-client.js";

const logger = getChildLogger({ module: "app" });

const MINUTE_MS = 60_000;

export type App = {
	config: VitalsyncConfig;
	env: VitalsyncEnv;
	store: TokenStore;
	coordinator: RefreshCoordinator;
	/** Undefined when `sync.enabled` is false. */
	sync: ConfigSync | undefined;
	configSummary: ConfigSummary;
	close: () => void;
};

export type CreateAppOptions = {
	config: VitalsyncConfig;
	env: VitalsyncEnv;
	/** Defaults to `<dataDir>/vitalsync.db`; pass ":memory:" in tests. */
	dbPath?: string;
	vendor?: VendorOAuthClient;
	sync?: ConfigSync;
	now?: () => number;
};

export function summarizeConfig(config: VitalsyncConfig, env: VitalsyncEnv): ConfigSummary {
	return {
		withingsClientId: env.clientId.length > 0,
		withingsClientSecret: env.clientSecret.length > 0,
		encryptionKey: env.encryptionKey.length > 0,
		adminToken: env.adminToken !== undefined,
		railway: {
			apiToken: env.railway.apiToken !== undefined,
			projectId: env.railway.projectId !== undefined,
			environmentId: env.railway.environmentId !== undefined,
			serviceId: env.railway.serviceId !== undefined,
		},
		autoRefresh: config.refresh.autoRefresh,
		syncEnabled: config.sync.enabled,
		lookAheadMinutes: config.refresh.lookAheadMinutes,
		intervalMinutes: config.refresh.intervalMinutes,
	};
}

/**
 * Build the token lifecycle graph. Throws ConfigurationError if the encryption
 * key is unusable; the database is not opened in that case.
 */
export function createApp(options: CreateAppOptions): App {
	const { config, env } = options;
	const now = options.now ?? Date.now;

	const cipher = new AesGcmCipher(env.encryptionKey);
	const db: Database.Database = openDatabase(options.dbPath ?? resolveDbPath(config.dataDir));
	const store = new SqliteTokenStore(db, cipher, now);

	const vendor =
		options.vendor ?? new WithingsOAuthClient({ timeoutMs: config.vendor.timeoutMs, now });

	let sync: ConfigSync | undefined;
	if (config.sync.enabled) {
		sync = options.sync ?? new RailwayConfigSync(env.railway, { timeoutMs: config.vendor.timeoutMs });
		if (!sync.isConfigured()) {
			logger.info({ missing: sync.missingConfig() }, "external config sync not configured; skipping pushes");
		}
	}

	const coordinator = new RefreshCoordinator({
		store,
		vendor,
		credentials: { clientId: env.clientId, clientSecret: env.clientSecret },
		redirectUri: config.vendor.redirectUri,
		sync,
		lookAheadMs: config.refresh.lookAheadMinutes * MINUTE_MS,
		redeployOnScheduledRefresh: config.sync.redeployOnRefresh,
		now,
	});

	let closed = false;
	return {
		config,
		env,
		store,
		coordinator,
		sync,
		configSummary: summarizeConfig(config, env),
		close: () => {
			if (closed) return;
			closed = true;
			db.close();
		},
	};
}

export function refreshIntervalMs(config: VitalsyncConfig): number {
	return config.refresh.intervalMinutes * MINUTE_MS;
}
