import chalk from "chalk";
import type { Command } from "commander";

import { getConfigPath } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { toIso } from "../utils.js";
import { reportCommandError, withApp } from "./runtime.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show token status and configuration")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			try {
				await withApp(async (app) => {
					const token = app.coordinator.getStatus();
					const syncMissing = app.sync?.missingConfig() ?? [];

					const status = {
						config: {
							path: getConfigPath(),
							dataDir: app.config.dataDir,
						},
						token: {
							configured: token.configured,
							expiresAt: token.expiresAt === null ? null : toIso(token.expiresAt),
							expiresInHours: token.expiresInHours,
							isExpired: token.isExpired,
							shouldRefresh: token.shouldRefresh,
							lastRefreshedAt: token.lastRefreshedAt === null ? null : toIso(token.lastRefreshedAt),
						},
						sync: {
							enabled: app.sync !== undefined,
							configured: app.sync?.isConfigured() ?? false,
							missing: syncMissing,
						},
						refresh: {
							autoRefresh: app.config.refresh.autoRefresh,
							lookAheadMinutes: app.config.refresh.lookAheadMinutes,
							intervalMinutes: app.config.refresh.intervalMinutes,
						},
					};

					if (opts.json) {
						console.log(JSON.stringify(status, null, 2));
						return;
					}

					console.log(chalk.bold("=== vitalsync status ===\n"));

					console.log("Configuration:");
					console.log(`  Path: ${status.config.path}`);
					console.log(`  Data dir: ${status.config.dataDir}`);
					console.log();

					console.log("Token:");
					if (!status.token.configured) {
						console.log(chalk.yellow("  Not authorized yet. Run `vitalsync auth-url` to start."));
					} else {
						const expiry = status.token.isExpired
							? chalk.red(`${status.token.expiresAt} (expired)`)
							: chalk.green(`${status.token.expiresAt} (${status.token.expiresInHours}h left)`);
						console.log(`  Expires at: ${expiry}`);
						console.log(`  Last refreshed: ${status.token.lastRefreshedAt}`);
						console.log(`  Refresh due: ${status.token.shouldRefresh ? "yes" : "no"}`);
					}
					console.log();

					console.log("External sync:");
					if (!status.sync.enabled) {
						console.log("  disabled");
					} else if (status.sync.configured) {
						console.log(chalk.green("  configured"));
					} else {
						console.log(chalk.yellow(`  not configured (missing ${status.sync.missing.join(", ")})`));
					}
				});
			} catch (err) {
				logger.error({ error: String(err) }, "status command failed");
				reportCommandError(err);
				process.exitCode = 1;
			}
		});
}
