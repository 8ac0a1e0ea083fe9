import chalk from "chalk";

import { type App, createApp } from "../app.js";
import { loadConfig } from "../config/config.js";
import { readEnv } from "../env.js";
import { isConfigurationError } from "../infra/network-errors.js";
import type { SyncOutcome } from "../tokens/coordinator.js";

/**
 * Build the app from the on-disk config and the process environment, run `fn`,
 * and close the database afterwards whatever happens.
 */
export async function withApp<T>(fn: (app: App) => Promise<T>): Promise<T> {
	const app = createApp({ config: loadConfig(), env: readEnv() });
	try {
		return await fn(app);
	} finally {
		app.close();
	}
}

/**
 * Print a command failure. Configuration problems get a hint since they are
 * fixed by the operator, not by retrying.
 */
export function reportCommandError(err: unknown): void {
	const message = err instanceof Error ? err.message : String(err);
	console.error(chalk.red(`Error: ${message}`));
	if (isConfigurationError(err)) {
		console.error(chalk.gray("Check the environment variables and config file, then try again."));
	}
}

export function describeSync(outcome: SyncOutcome): string {
	switch (outcome.status) {
		case "synced":
			return chalk.green(
				`synced ${outcome.variables.length} variables${outcome.redeployed ? " and triggered redeploy" : ""}`,
			);
		case "skipped":
			return chalk.yellow(`skipped (${outcome.reason})`);
		case "failed":
			return chalk.red(`failed: ${outcome.message}`);
	}
}
