/**
 * Mirror the live token pair into Railway service variables.
 *
 * Best-effort: every failure comes back as a value, never as a throw, so a
 * refresh that already committed to the store can't be undone by a sync error.
 */

import { z } from "zod";

import { SyncError, TransientError } from "../errors.js";
import type { RailwayEnv } from "../env.js";
import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import { type RetryOptions, retryAsync } from "../infra/retry.js";
import { fetchJsonWithTimeout, type JsonReply } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import type { TokenRecord } from "../tokens/types.js";
import { toIso } from "../utils.js";

const logger = getChildLogger({ module: "railway-sync" });

export const RAILWAY_GRAPHQL_URL = "https://backboard.railway.app/graphql/v2";

export const SYNC_VARIABLE_NAMES = {
	accessToken: "WITHINGS_ACCESS_TOKEN",
	refreshToken: "WITHINGS_REFRESH_TOKEN",
	expiresAt: "WITHINGS_TOKEN_EXPIRES_AT",
	lastRefreshedAt: "WITHINGS_TOKEN_LAST_REFRESHED",
} as const;

const REQUIRED_ENV: ReadonlyArray<[keyof RailwayEnv, string]> = [
	["apiToken", "RAILWAY_API_TOKEN"],
	["projectId", "RAILWAY_PROJECT_ID"],
	["environmentId", "RAILWAY_ENVIRONMENT_ID"],
	["serviceId", "RAILWAY_SERVICE_ID"],
];

const UPSERT_MUTATION = `
mutation UpsertVariables($input: VariableCollectionUpsertInput!) {
	variableCollectionUpsert(input: $input)
}`;

const REDEPLOY_MUTATION = `
mutation Redeploy($environmentId: String!, $serviceId: String!) {
	serviceInstanceRedeploy(environmentId: $environmentId, serviceId: $serviceId)
}`;

const GraphqlResponseSchema = z.object({
	data: z.unknown().optional(),
	errors: z.array(z.object({ message: z.string() })).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type SyncResult = { ok: true; variables: string[] } | { ok: false; error: SyncError };

export type RedeployResult = { ok: true } | { ok: false; error: SyncError };

export interface ConfigSync {
	push(record: TokenRecord): Promise<SyncResult>;
	redeploy(): Promise<RedeployResult>;
	isConfigured(): boolean;
	missingConfig(): string[];
}

export interface RailwaySyncOptions {
	endpoint?: string;
	timeoutMs?: number;
	retry?: Omit<RetryOptions, "shouldRetry" | "onRetry">;
}

type ResolvedRailwayEnv = Required<RailwayEnv>;

/**
 * Variable values derived only from the record, so pushing the same record twice
 * leaves the external state exactly as pushing it once.
 */
export function buildSyncVariables(record: TokenRecord): Record<string, string> {
	return {
		[SYNC_VARIABLE_NAMES.accessToken]: record.accessToken,
		[SYNC_VARIABLE_NAMES.refreshToken]: record.refreshToken,
		[SYNC_VARIABLE_NAMES.expiresAt]: toIso(record.expiresAt),
		[SYNC_VARIABLE_NAMES.lastRefreshedAt]: toIso(record.lastRefreshedAt),
	};
}

// ═══════════════════════════════════════════════════════════════════════════════
// Client
// ═══════════════════════════════════════════════════════════════════════════════

export class RailwayConfigSync implements ConfigSync {
	private readonly endpoint: string;
	private readonly timeoutMs: number;
	private readonly retry: Omit<RetryOptions, "shouldRetry" | "onRetry">;

	constructor(
		private readonly env: RailwayEnv,
		options: RailwaySyncOptions = {},
	) {
		this.endpoint = options.endpoint ?? RAILWAY_GRAPHQL_URL;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.retry = { maxAttempts: 3, ...options.retry };
	}

	isConfigured(): boolean {
		return this.missingConfig().length === 0;
	}

	missingConfig(): string[] {
		return REQUIRED_ENV.filter(([key]) => !this.env[key]).map(([, name]) => name);
	}

	async push(record: TokenRecord): Promise<SyncResult> {
		const resolved = this.resolveEnv();
		if (!resolved.ok) return resolved;

		const variables = buildSyncVariables(record);
		const names = Object.keys(variables);

		try {
			await retryAsync(
				() =>
					this.execute(resolved.env, UPSERT_MUTATION, {
						input: {
							projectId: resolved.env.projectId,
							environmentId: resolved.env.environmentId,
							serviceId: resolved.env.serviceId,
							variables,
							// Redeploy is an explicit, separate step
							skipDeploys: true,
						},
					}),
				{
					...this.retry,
					shouldRetry: (err) => err instanceof TransientError,
					onRetry: (err, info) => {
						logger.warn(
							{ attempt: info.attempt, delayMs: info.delayMs, error: formatErrorSafe(err) },
							"railway variable upsert failed; retrying",
						);
					},
				},
			);
		} catch (err) {
			const message = formatErrorSafe(err);
			logger.warn({ error: message }, "railway variable sync failed");
			return { ok: false, error: new SyncError(`Railway variable upsert failed: ${message}`, { cause: err }) };
		}

		logger.info({ variables: names }, "railway variables updated");
		return { ok: true, variables: names };
	}

	async redeploy(): Promise<RedeployResult> {
		const resolved = this.resolveEnv();
		if (!resolved.ok) return resolved;

		try {
			await this.execute(resolved.env, REDEPLOY_MUTATION, {
				environmentId: resolved.env.environmentId,
				serviceId: resolved.env.serviceId,
			});
		} catch (err) {
			const message = formatErrorSafe(err);
			logger.warn({ error: message }, "railway redeploy failed");
			return { ok: false, error: new SyncError(`Railway redeploy failed: ${message}`, { cause: err }) };
		}

		logger.info("railway redeploy triggered");
		return { ok: true };
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Internals
	// ═══════════════════════════════════════════════════════════════════════════

	private resolveEnv(): { ok: true; env: ResolvedRailwayEnv } | { ok: false; error: SyncError } {
		const { apiToken, projectId, environmentId, serviceId } = this.env;
		if (!apiToken || !projectId || !environmentId || !serviceId) {
			return {
				ok: false,
				error: new SyncError(`Railway sync not configured. Missing: ${this.missingConfig().join(", ")}`),
			};
		}
		return { ok: true, env: { apiToken, projectId, environmentId, serviceId } };
	}

	/**
	 * One GraphQL round trip. Network failures, timeouts, 429 and 5xx are
	 * TransientError (retryable); GraphQL-level errors and other HTTP codes are not.
	 */
	private async execute(
		env: ResolvedRailwayEnv,
		query: string,
		variables: Record<string, unknown>,
	): Promise<void> {
		let reply: JsonReply;
		try {
			reply = await fetchJsonWithTimeout(
				this.endpoint,
				{
					method: "POST",
					headers: {
						Authorization: `Bearer ${env.apiToken}`,
						"Content-Type": "application/json",
					},
					body: JSON.stringify({ query, variables }),
					redirect: "error",
				},
				this.timeoutMs,
			);
		} catch (err) {
			if (isTransientNetworkError(err)) {
				throw new TransientError(`Railway API unreachable: ${formatErrorSafe(err)}`, { cause: err });
			}
			throw err;
		}

		const { status } = reply;
		if (status === 429 || status >= 500) {
			throw new TransientError(`Railway API returned HTTP ${status}`);
		}
		if (!reply.body.parsed) {
			throw new Error(`Railway API returned a non-JSON body (HTTP ${status})`, { cause: reply.body.error });
		}
		const payload = reply.body.value;

		const parsed = GraphqlResponseSchema.safeParse(payload);
		if (!parsed.success) {
			throw new Error(`Railway API returned an unexpected body (HTTP ${status})`);
		}
		const firstError = parsed.data.errors?.[0];
		if (firstError) {
			throw new Error(`Railway API error: ${firstError.message}`);
		}
		if (!reply.ok) {
			throw new Error(`Railway API returned HTTP ${status}`);
		}
	}
}
