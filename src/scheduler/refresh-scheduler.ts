import { InvalidCredentialError, TransientError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { RefreshCoordinator } from "../tokens/coordinator.js";

const logger = getChildLogger({ module: "refresh-scheduler" });

export const MIN_INTERVAL_MS = 60_000;
export const DEFAULT_INTERVAL_MS = 30 * 60_000;

export type TickOutcome =
	| "refreshed"
	| "not_due"
	| "skipped_failed"
	| "transient_error"
	| "invalid_credential"
	| "error";

export type SchedulerStatus = {
	/** Timer armed; false after stop(). */
	running: boolean;
	tickInProgress: boolean;
	intervalMs: number;
	lastTickAt: number | null;
	lastOutcome: TickOutcome | null;
};

export type RefreshScheduler = {
	stop: () => void;
	getStatus: () => SchedulerStatus;
};

export function startRefreshScheduler(options: {
	coordinator: Pick<RefreshCoordinator, "getState" | "refreshIfDue">;
	intervalMs?: number;
	now?: () => number;
}): RefreshScheduler {
	const intervalMs = Math.max(options.intervalMs ?? DEFAULT_INTERVAL_MS, MIN_INTERVAL_MS);
	const now = options.now ?? Date.now;
	let tickInProgress = false;
	let stopped = false;
	let lastTickAt: number | null = null;
	let lastOutcome: TickOutcome | null = null;

	const tick = async (): Promise<TickOutcome> => {
		if (options.coordinator.getState() === "failed") {
			logger.error("refresh credential rejected earlier; skipping tick until re-authorized");
			return "skipped_failed";
		}
		try {
			const result = await options.coordinator.refreshIfDue();
			if (!result) return "not_due";
			logger.info({ sync: result.sync.status }, "scheduled refresh completed");
			return "refreshed";
		} catch (err) {
			if (err instanceof TransientError) {
				logger.warn({ error: formatErrorSafe(err) }, "scheduled refresh failed; will retry next tick");
				return "transient_error";
			}
			if (err instanceof InvalidCredentialError) {
				logger.error({ reason: err.reason }, "scheduled refresh rejected; re-authorization required");
				return "invalid_credential";
			}
			logger.error({ error: formatErrorSafe(err) }, "scheduled refresh failed");
			return "error";
		}
	};

	const runTick = async () => {
		if (tickInProgress) {
			logger.warn("previous refresh tick still in progress; skipping");
			return;
		}
		tickInProgress = true;
		try {
			lastOutcome = await tick();
			lastTickAt = now();
		} finally {
			tickInProgress = false;
		}
	};

	const timer = setInterval(() => void runTick(), intervalMs);
	timer.unref();

	logger.info({ intervalMs }, "refresh scheduler started");
	void runTick();

	return {
		stop: () => {
			if (stopped) return;
			stopped = true;
			clearInterval(timer);
			logger.info("refresh scheduler stopped");
		},
		getStatus: () => ({
			running: !stopped,
			tickInProgress,
			intervalMs,
			lastTickAt,
			lastOutcome,
		}),
	};
}
