/**
 * Run the long-lived service: admin HTTP server plus the refresh scheduler.
 *
 * Usage:
 *   vitalsync serve [--host <host>] [--port <port>] [--no-scheduler]
 */

import chalk from "chalk";
import type { Command } from "commander";

import { buildServer } from "../admin/server.js";
import { createApp, refreshIntervalMs } from "../app.js";
import { loadConfig } from "../config/config.js";
import { readEnv } from "../env.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger, getResolvedLoggerSettings } from "../logging.js";
import { type RefreshScheduler, startRefreshScheduler } from "../scheduler/refresh-scheduler.js";
import { reportCommandError } from "./runtime.js";

const logger = getChildLogger({ module: "cmd-serve" });

export type ServeOptions = {
	host?: string;
	port?: string;
	scheduler: boolean;
};

function parsePort(raw: string): number {
	const port = Number.parseInt(raw, 10);
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new Error(`Invalid port: ${raw}`);
	}
	return port;
}

export function registerServeCommand(program: Command): void {
	program
		.command("serve")
		.description("Run the admin server and the automatic refresh scheduler")
		.option("--host <host>", "Interface to bind")
		.option("--port <port>", "Port to listen on")
		.option("--no-scheduler", "Do not start the automatic refresh scheduler")
		.action(async (opts: ServeOptions) => {
			try {
				installUnhandledRejectionHandler("serve");

				const config = loadConfig();
				const env = readEnv();
				const app = createApp({ config, env });

				let scheduler: RefreshScheduler | undefined;
				if (opts.scheduler && config.refresh.autoRefresh) {
					scheduler = startRefreshScheduler({
						coordinator: app.coordinator,
						intervalMs: refreshIntervalMs(config),
					});
				} else {
					logger.info("automatic refresh disabled");
				}

				if (!env.adminToken) {
					logger.warn("ADMIN_API_TOKEN is not set; admin routes will answer 503");
				}

				const server = await buildServer({
					coordinator: app.coordinator,
					scheduler,
					adminToken: env.adminToken,
					configSummary: app.configSummary,
					logLevel: getResolvedLoggerSettings().level,
				});

				const host = opts.host ?? config.server.host;
				const port = opts.port ? parsePort(opts.port) : (env.port ?? config.server.port);
				await server.listen({ host, port });

				console.log(chalk.green(`vitalsync listening on http://${host}:${port}`));

				const shutdown = async (signal: string) => {
					logger.info({ signal }, "received shutdown signal");
					console.log(`\nReceived ${signal}, shutting down...`);
					scheduler?.stop();
					try {
						await server.close();
					} finally {
						app.close();
					}
					process.exit(0);
				};

				process.on("SIGINT", () => void shutdown("SIGINT"));
				process.on("SIGTERM", () => void shutdown("SIGTERM"));

				// Keep the action pending so the CLI teardown doesn't run while serving
				await new Promise(() => {
					// Never resolves - runs until signaled
				});
			} catch (err) {
				logger.error({ error: String(err) }, "serve command failed");
				reportCommandError(err);
				process.exit(1);
			}
		});
}
