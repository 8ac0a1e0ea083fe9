import fs from "node:fs";

import { Command } from "commander";

// Same relative path from src/cli and dist/cli
const PACKAGE_JSON = new URL("../../package.json", import.meta.url);

export function readPackageVersion(): string {
	const manifest: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, "utf8"));
	if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
		const { version } = manifest;
		if (typeof version === "string") return version;
	}
	return "0.0.0";
}

export function createProgram(): Command {
	return new Command("vitalsync")
		.description("Keeps Withings OAuth tokens fresh and mirrored to the deployment")
		.version(readPackageVersion())
		.option("-v, --verbose", "log at debug level")
		.option("-c, --config <path>", "settings file (default ~/.vitalsync/vitalsync.json)")
		.showHelpAfterError()
		.configureHelp({ sortSubcommands: true });
}
