/**
 * SQLite storage layer for vitalsync.
 *
 * Holds the single encrypted token row. better-sqlite3 is synchronous, so every
 * statement is atomic with respect to readers in this process.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "storage" });

export const DB_FILE_NAME = "vitalsync.db";
export const IN_MEMORY_DB = ":memory:";
const SCHEMA_VERSION = 1;

export function resolveDbPath(dataDir: string): string {
	return path.join(dataDir, DB_FILE_NAME);
}

/**
 * Open (and migrate) the database at `dbPath`.
 * Uses WAL mode for file-backed databases.
 *
 * SECURITY: Sets restrictive file permissions on the database and its directory.
 */
export function openDatabase(dbPath: string): Database.Database {
	if (dbPath === IN_MEMORY_DB) {
		const memory = new Database(IN_MEMORY_DB);
		migrate(memory);
		return memory;
	}

	const dbDir = path.dirname(dbPath);
	fs.mkdirSync(dbDir, { recursive: true, mode: 0o700 });
	try {
		fs.chmodSync(dbDir, 0o700);
	} catch {
		logger.warn({ path: dbDir }, "could not set directory permissions to 0700");
	}

	const db = new Database(dbPath);

	try {
		fs.chmodSync(dbPath, 0o600);
	} catch {
		logger.warn({ path: dbPath }, "could not set database file permissions to 0600");
	}

	db.pragma("journal_mode = WAL");
	migrate(db);

	logger.info({ path: dbPath }, "database initialized");
	return db;
}

/**
 * Run database migrations.
 */
function migrate(database: Database.Database): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = database.prepare("SELECT version FROM schema_version LIMIT 1").get() as
		| { version: number }
		| undefined;
	const currentVersion = row?.version ?? 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	// Migration 1: single-row token table (id pinned to 1)
	if (currentVersion < 1) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS oauth_tokens (
				id INTEGER PRIMARY KEY CHECK (id = 1),
				access_token TEXT NOT NULL,
				refresh_token TEXT NOT NULL,
				expires_at INTEGER NOT NULL,
				last_refreshed_at INTEGER NOT NULL,
				user_id TEXT,
				scope TEXT,
				updated_at INTEGER NOT NULL
			);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}
