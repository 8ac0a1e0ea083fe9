import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { censorSecret } from "./security/mask.js";
import { CONFIG_DIR } from "./utils.js";

export const DEFAULT_LOG_FILE = path.join(CONFIG_DIR, "logs", "vitalsync.log");
export const STDOUT_LOG_FILE = "-";

const LEVELS: ReadonlySet<string> = new Set(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);

// Token material must never reach a log line in full, whatever the call site passes.
const REDACT_PATHS = ["accessToken", "refreshToken", "clientSecret"].flatMap((key) => [key, `*.${key}`]);

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

export type LoggerResolvedSettings = Required<LoggerSettings>;

type Destination = DestinationStream & {
	flushSync?: () => void;
	end?: () => void;
};

/**
 * The stream every logger writes through. Module loggers are created at import
 * time, before `--config` and `--verbose` are applied, so a settings change
 * swaps the file behind this stream instead of building a new one.
 */
class RetargetableDestination implements DestinationStream {
	private target: Destination | null = null;

	constructor(private file: string) {}

	write(line: string): void {
		this.target ??= openDestination(this.file);
		this.target.write(line);
	}

	retarget(file: string): void {
		this.close();
		this.file = file;
	}

	close(): void {
		if (!this.target) return;
		this.target.flushSync?.();
		// stdout stays open for whatever else writes to it
		if (this.file !== STDOUT_LOG_FILE) this.target.end?.();
		this.target = null;
	}
}

type LoggerState = {
	root: Logger;
	stream: RetargetableDestination;
	settings: LoggerResolvedSettings;
};

let current: LoggerState | null = null;
let overrideSettings: LoggerSettings | null = null;

// Children that follow the root level; those created with an explicit level keep it.
const children: Logger[] = [];

function isLevel(candidate: string): candidate is LevelWithSilent {
	return LEVELS.has(candidate);
}

function readConfiguredSettings(): LoggerSettings {
	if (overrideSettings) return overrideSettings;
	try {
		return loadConfig().logging ?? {};
	} catch {
		// The command that needs the config reports why it is invalid
		return {};
	}
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	const configured = readConfiguredSettings();
	const level = isVerbose() ? "debug" : (configured.level ?? "info");
	return {
		level: isLevel(level) ? level : "info",
		file: configured.file ?? DEFAULT_LOG_FILE,
	};
}

function openDestination(file: string): Destination {
	if (file === STDOUT_LOG_FILE) {
		return pino.destination({ dest: 1, sync: true });
	}

	// Logs sit next to token state: owner-only, even when the file already exists
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	fs.closeSync(fs.openSync(file, "a", 0o600));
	fs.chmodSync(file, 0o600);

	return pino.destination({ dest: file, sync: true });
}

export function getLogger(): Logger {
	const settings = getResolvedLoggerSettings();
	if (!current) {
		const stream = new RetargetableDestination(settings.file);
		const root = pino(
			{
				level: settings.level,
				base: undefined,
				timestamp: pino.stdTimeFunctions.isoTime,
				redact: { paths: REDACT_PATHS, censor: censorSecret },
			},
			stream,
		);
		current = { root, stream, settings };
		return root;
	}

	if (settings.file !== current.settings.file) {
		current.stream.retarget(settings.file);
	}
	if (settings.level !== current.settings.level) {
		current.root.level = settings.level;
		for (const child of children) child.level = settings.level;
	}
	current.settings = settings;
	return current.root;
}

export function getChildLogger(bindings: Bindings = {}, opts?: { level?: LevelWithSilent }): Logger {
	const child = getLogger().child(bindings, opts);
	if (!opts?.level) children.push(child);
	return child;
}

export function setLoggerOverride(settings: LoggerSettings | null): void {
	overrideSettings = settings;
	getLogger();
}

/**
 * Flushes and closes the log file. A later log line reopens it.
 */
export function closeLogger(): void {
	current?.stream.close();
}
