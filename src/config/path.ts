import path from "node:path";
import { CONFIG_DIR } from "../utils.js";

let configPathOverride: string | null = null;

/**
 * Config file location: the `--config` flag wins, then `VITALSYNC_CONFIG`,
 * then `vitalsync.json` under the data directory.
 */
export function resolveConfigPath(): string {
	return configPathOverride ?? process.env.VITALSYNC_CONFIG ?? path.join(CONFIG_DIR, "vitalsync.json");
}

export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}

export function resetConfigPath(): void {
	configPathOverride = null;
}
