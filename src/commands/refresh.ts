/**
 * Manual token refresh.
 *
 * Usage:
 *   vitalsync refresh [--no-sync] [--redeploy] [--output-env]
 *
 * `--output-env` prints the new pair as KEY=value lines for pasting into a
 * deployment by hand. Those lines contain the full tokens.
 */

import chalk from "chalk";
import type { Command } from "commander";

import { getChildLogger } from "../logging.js";
import { maskSecret } from "../security/mask.js";
import { buildSyncVariables } from "../sync/railway.js";
import { hoursBetween, toIso } from "../utils.js";
import { describeSync, reportCommandError, withApp } from "./runtime.js";

const logger = getChildLogger({ module: "cmd-refresh" });

export type RefreshCommandOptions = {
	sync: boolean;
	redeploy?: boolean;
	outputEnv?: boolean;
};

export function registerRefreshCommand(program: Command): void {
	program
		.command("refresh")
		.description("Refresh the vendor access token now")
		.option("--no-sync", "Do not push the new tokens to the external config store")
		.option("--redeploy", "Redeploy the service after syncing")
		.option("--output-env", "Print the new tokens as environment variable lines")
		.action(async (opts: RefreshCommandOptions) => {
			try {
				await withApp(async (app) => {
					const { record, sync } = await app.coordinator.refresh({
						sync: opts.sync,
						redeploy: opts.redeploy ?? false,
					});

					console.log(chalk.green("✓ Token refreshed"));
					console.log(`  Access token:  ${maskSecret(record.accessToken)}`);
					console.log(`  Refresh token: ${maskSecret(record.refreshToken)}`);
					console.log(
						`  Expires at:    ${toIso(record.expiresAt)} (${hoursBetween(Date.now(), record.expiresAt)}h)`,
					);
					console.log(`  Sync:          ${describeSync(sync)}`);

					if (opts.outputEnv) {
						console.log("");
						for (const [name, value] of Object.entries(buildSyncVariables(record))) {
							console.log(`${name}=${value}`);
						}
					}
				});
			} catch (err) {
				logger.error({ error: String(err) }, "refresh command failed");
				reportCommandError(err);
				process.exitCode = 1;
			}
		});
}
