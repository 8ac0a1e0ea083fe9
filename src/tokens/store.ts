/**
 * Token store: the one live TokenRecord, encrypted at rest.
 *
 * Each save overwrites the single row; there is no history. Loads and saves are
 * single statements on a synchronous driver, so a reader sees either the old
 * row or the new one, never a mix.
 */

import type Database from "better-sqlite3";
import { z } from "zod";

import { getChildLogger } from "../logging.js";
import type { SecretCipher } from "./cipher.js";
import { MAX_TOKEN_LENGTH, type TokenRecord } from "./types.js";

const logger = getChildLogger({ module: "token-store" });

const TokenRowSchema = z.object({
	access_token: z.string(),
	refresh_token: z.string(),
	expires_at: z.number(),
	last_refreshed_at: z.number(),
	user_id: z.string().nullable(),
	scope: z.string().nullable(),
	updated_at: z.number(),
});

export interface TokenRowMetadata {
	expiresAt: number;
	lastRefreshedAt: number;
	updatedAt: number;
}

export interface TokenStore {
	load(): TokenRecord | null;
	save(record: TokenRecord): void;
	/** Non-secret columns only; nothing is decrypted. */
	describe(): TokenRowMetadata | null;
}

function assertStorableToken(name: string, value: string): void {
	if (!value) {
		throw new Error(`Refusing to persist a token record with an empty ${name}`);
	}
	if (value.length > MAX_TOKEN_LENGTH) {
		throw new Error(`Refusing to persist ${name} longer than ${MAX_TOKEN_LENGTH} characters`);
	}
}

export class SqliteTokenStore implements TokenStore {
	private readonly selectStmt: Database.Statement;
	private readonly upsertStmt: Database.Statement;

	constructor(
		db: Database.Database,
		private readonly cipher: SecretCipher,
		private readonly now: () => number = Date.now,
	) {
		this.selectStmt = db.prepare(
			`SELECT access_token, refresh_token, expires_at, last_refreshed_at, user_id, scope, updated_at
			 FROM oauth_tokens WHERE id = 1`,
		);
		this.upsertStmt = db.prepare(
			`INSERT INTO oauth_tokens
				(id, access_token, refresh_token, expires_at, last_refreshed_at, user_id, scope, updated_at)
			 VALUES (1, @accessToken, @refreshToken, @expiresAt, @lastRefreshedAt, @userId, @scope, @updatedAt)
			 ON CONFLICT(id) DO UPDATE SET
				access_token = excluded.access_token,
				refresh_token = excluded.refresh_token,
				expires_at = excluded.expires_at,
				last_refreshed_at = excluded.last_refreshed_at,
				user_id = excluded.user_id,
				scope = excluded.scope,
				updated_at = excluded.updated_at`,
		);
	}

	load(): TokenRecord | null {
		const row = this.readRow();
		if (!row) return null;

		return {
			accessToken: this.cipher.decrypt(row.access_token),
			refreshToken: this.cipher.decrypt(row.refresh_token),
			expiresAt: row.expires_at,
			lastRefreshedAt: row.last_refreshed_at,
			userId: row.user_id ?? undefined,
			scope: row.scope ?? undefined,
		};
	}

	save(record: TokenRecord): void {
		assertStorableToken("access token", record.accessToken);
		assertStorableToken("refresh token", record.refreshToken);

		this.upsertStmt.run({
			accessToken: this.cipher.encrypt(record.accessToken),
			refreshToken: this.cipher.encrypt(record.refreshToken),
			expiresAt: record.expiresAt,
			lastRefreshedAt: record.lastRefreshedAt,
			userId: record.userId ?? null,
			scope: record.scope ?? null,
			updatedAt: this.now(),
		});

		logger.debug(
			{ expiresAt: new Date(record.expiresAt).toISOString() },
			"token record persisted",
		);
	}

	describe(): TokenRowMetadata | null {
		const row = this.readRow();
		if (!row) return null;
		return {
			expiresAt: row.expires_at,
			lastRefreshedAt: row.last_refreshed_at,
			updatedAt: row.updated_at,
		};
	}

	private readRow(): z.infer<typeof TokenRowSchema> | null {
		const raw = this.selectStmt.get();
		if (raw === undefined) return null;
		return TokenRowSchema.parse(raw);
	}
}
