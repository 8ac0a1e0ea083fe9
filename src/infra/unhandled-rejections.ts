/**
 * Process-wide unhandledRejection policy for `vitalsync serve`.
 *
 * The service has to keep refreshing for weeks, so only a configuration error
 * takes the process down. Network hiccups and aborts are logged and dropped.
 */

import { getChildLogger } from "../logging.js";
import {
	formatErrorSafe,
	isAbortError,
	isConfigurationError,
	isTransientNetworkError,
} from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "config" | "transient" | "abort" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isConfigurationError(err)) return "config";
	if (isTransientNetworkError(err)) return "transient";
	return "unknown";
}

export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const context = { process: processLabel, category };
		const detail = formatErrorSafe(reason);

		if (category === "abort") {
			logger.debug(context, `ignored abort rejection: ${detail}`);
		} else if (category === "transient") {
			logger.warn(context, `transient rejection, continuing: ${detail}`);
		} else if (category === "config") {
			logger.fatal(context, `configuration error, exiting: ${detail}`);
			process.exit(1);
		} else {
			logger.error(context, `unhandled rejection: ${detail}`);
		}
	});
}
