/**
 * Authorization-code bootstrap.
 *
 * Usage:
 *   vitalsync auth-url [--state <state>]
 *   vitalsync exchange <code> [--no-sync]
 */

import chalk from "chalk";
import type { Command } from "commander";

import { getChildLogger } from "../logging.js";
import { maskSecret } from "../security/mask.js";
import { toIso } from "../utils.js";
import { describeSync, reportCommandError, withApp } from "./runtime.js";

const logger = getChildLogger({ module: "cmd-authorize" });

export function registerAuthorizeCommands(program: Command): void {
	program
		.command("auth-url")
		.description("Print the vendor authorization URL to open in a browser")
		.option("--state <state>", "Opaque state value to round-trip through the redirect")
		.action(async (opts: { state?: string }) => {
			try {
				await withApp(async (app) => {
					console.log(app.coordinator.getAuthorizationUrl(opts.state));
				});
			} catch (err) {
				logger.error({ error: String(err) }, "auth-url command failed");
				reportCommandError(err);
				process.exitCode = 1;
			}
		});

	program
		.command("exchange")
		.description("Exchange an authorization code for a token pair")
		.argument("<code>", "Authorization code from the redirect")
		.option("--no-sync", "Do not push the new tokens to the external config store")
		.action(async (code: string, opts: { sync: boolean }) => {
			try {
				await withApp(async (app) => {
					const { record, sync } = await app.coordinator.exchangeCode(code, { sync: opts.sync });

					console.log(chalk.green("✓ Authorization complete"));
					console.log(`  User:          ${record.userId ?? "unknown"}`);
					console.log(`  Access token:  ${maskSecret(record.accessToken)}`);
					console.log(`  Refresh token: ${maskSecret(record.refreshToken)}`);
					console.log(`  Expires at:    ${toIso(record.expiresAt)}`);
					console.log(`  Sync:          ${describeSync(sync)}`);
				});
			} catch (err) {
				logger.error({ error: String(err) }, "exchange command failed");
				reportCommandError(err);
				process.exitCode = 1;
			}
		});
}
