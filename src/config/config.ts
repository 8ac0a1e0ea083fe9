import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { CONFIG_DIR } from "../utils.js";
import { resolveConfigPath } from "./path.js";

const LogLevelSchema = z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);

const ServerConfigSchema = z.object({
	host: z.string().default("0.0.0.0"),
	port: z.number().int().min(1).max(65535).default(8080),
});

// Proactive refresh policy. The look-ahead must comfortably exceed the tick interval,
// otherwise a token can expire between two ticks.
const RefreshConfigSchema = z.object({
	autoRefresh: z.boolean().default(true),
	lookAheadMinutes: z.number().positive().default(60),
	intervalMinutes: z.number().positive().default(30),
});

const VendorConfigSchema = z.object({
	redirectUri: z.string().url().default("http://localhost:8080/auth/withings/callback"),
	timeoutMs: z.number().int().positive().default(30_000),
});

const SyncConfigSchema = z.object({
	enabled: z.boolean().default(true),
	redeployOnRefresh: z.boolean().default(false),
});

const LoggingConfigSchema = z.object({
	level: LogLevelSchema.optional(),
	// "-" writes to stdout (container deployments)
	file: z.string().optional(),
});

const VitalsyncConfigSchema = z.object({
	dataDir: z.string().default(CONFIG_DIR),
	server: ServerConfigSchema.default({}),
	refresh: RefreshConfigSchema.default({}),
	vendor: VendorConfigSchema.default({}),
	sync: SyncConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type VitalsyncConfig = z.infer<typeof VitalsyncConfigSchema>;
export type VitalsyncConfigInput = z.input<typeof VitalsyncConfigSchema>;

let cachedConfig: VitalsyncConfig | null = null;
let cachedConfigPath: string | null = null;
let configMtime: number | null = null;

/**
 * Validate a raw config object, applying defaults.
 */
export function parseConfig(raw: unknown): VitalsyncConfig {
	const result = VitalsyncConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		const details = result.error.errors
			.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
			.join("; ");
		throw new ConfigurationError(`Invalid configuration: ${details}`);
	}
	return result.data;
}

export function loadConfig(): VitalsyncConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EACCES") {
			// No readable config file - use defaults
			return parseConfig({});
		}
		if (err instanceof ConfigurationError) {
			throw err;
		}
		throw new ConfigurationError(`Failed to read config ${configPath}: ${String(err)}`, {
			cause: err,
		});
	}
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
