/**
 * Fastify admin surface for the token lifecycle.
 *
 * Routes:
 *   GET  /health                    liveness
 *   GET  /admin/token/status        persisted token view (unauthenticated, no secrets)
 *   POST /admin/token/refresh       force a refresh
 *   GET  /admin/oauth/authorize-url
 *   POST /admin/oauth/exchange      accept an authorization code
 *   GET  /admin/scheduler/status
 *   GET  /admin/config              which settings are present, never their values
 *
 * Everything under /admin except the status view requires `x-admin-token`.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { z } from "zod";

import { ConfigurationError, InvalidCredentialError, TransientError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { maskSecret } from "../security/mask.js";
import { matchesAdminToken } from "../security/safe-equal.js";
import type { RefreshScheduler } from "../scheduler/refresh-scheduler.js";
import type { RefreshCoordinator } from "../tokens/coordinator.js";
import { toIso } from "../utils.js";

export const ADMIN_TOKEN_HEADER = "x-admin-token";

// ═══════════════════════════════════════════════════════════════════════════════
// Server Options
// ═══════════════════════════════════════════════════════════════════════════════

export type ConfigSummary = {
	withingsClientId: boolean;
	withingsClientSecret: boolean;
	encryptionKey: boolean;
	adminToken: boolean;
	railway: {
		apiToken: boolean;
		projectId: boolean;
		environmentId: boolean;
		serviceId: boolean;
	};
	autoRefresh: boolean;
	syncEnabled: boolean;
	lookAheadMinutes: number;
	intervalMinutes: number;
};

export interface AdminServerOptions {
	coordinator: Pick<
		RefreshCoordinator,
		"getStatus" | "refresh" | "exchangeCode" | "getAuthorizationUrl"
	>;
	scheduler?: Pick<RefreshScheduler, "getStatus">;
	adminToken?: string;
	configSummary: ConfigSummary;
	logLevel?: string;
	now?: () => number;
}

const RefreshBodySchema = z
	.object({
		sync: z.boolean().optional(),
		redeploy: z.boolean().optional(),
	})
	.strict();

const ExchangeBodySchema = z
	.object({
		code: z.string().trim().min(1),
		sync: z.boolean().optional(),
	})
	.strict();

const AuthorizeQuerySchema = z.object({
	state: z.string().min(1).max(256).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// Error mapping
// ═══════════════════════════════════════════════════════════════════════════════

function sendError(request: FastifyRequest, reply: FastifyReply, err: unknown) {
	if (err instanceof InvalidCredentialError) {
		return reply.status(401).send({
			error: "invalid_credential",
			reason: err.reason,
			message: err.message,
		});
	}
	if (err instanceof TransientError) {
		return reply.status(502).send({
			error: "transient",
			retryable: true,
			message: err.message,
		});
	}
	if (err instanceof ConfigurationError) {
		return reply.status(503).send({
			error: "configuration_error",
			message: err.message,
		});
	}
	request.log.error({ error: formatErrorSafe(err) }, "admin request failed");
	return reply.status(500).send({ error: "internal_error" });
}

function toIsoOrNull(ms: number | null): string | null {
	return ms === null ? null : toIso(ms);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Build Server
// ═══════════════════════════════════════════════════════════════════════════════

export async function buildServer(opts: AdminServerOptions): Promise<FastifyInstance> {
	const { coordinator, scheduler, adminToken, configSummary } = opts;
	const now = opts.now ?? Date.now;

	const server = Fastify({
		logger: { level: opts.logLevel ?? "info" },
	});

	const requireAdmin = async (request: FastifyRequest, reply: FastifyReply) => {
		if (!adminToken) {
			return reply.status(503).send({
				error: "admin_not_configured",
				message: "ADMIN_API_TOKEN is not set; admin routes are disabled",
			});
		}
		const provided = request.headers[ADMIN_TOKEN_HEADER];
		if (!matchesAdminToken(provided, adminToken)) {
			request.log.warn({ url: request.url }, "rejected admin request");
			return reply.status(401).send({ error: "unauthorized" });
		}
	};

	// ─── GET /health ───────────────────────────────────────────────────────────
	server.get("/health", async (_request, reply) => {
		return reply.send({ ok: true });
	});

	// ─── GET /admin/token/status ───────────────────────────────────────────────
	server.get("/admin/token/status", async (request, reply) => {
		try {
			const status = coordinator.getStatus(now());
			return reply.send({
				configured: status.configured,
				expires_at: toIsoOrNull(status.expiresAt),
				expires_in_hours: status.expiresInHours,
				should_refresh: status.shouldRefresh,
				last_refreshed_at: toIsoOrNull(status.lastRefreshedAt),
				is_expired: status.isExpired,
				state: status.state,
				failure_reason: status.failureReason,
				last_error: status.lastError,
			});
		} catch (err) {
			return sendError(request, reply, err);
		}
	});

	// ─── POST /admin/token/refresh ─────────────────────────────────────────────
	server.post("/admin/token/refresh", { preHandler: requireAdmin }, async (request, reply) => {
		const parsed = RefreshBodySchema.safeParse(request.body ?? {});
		if (!parsed.success) {
			return reply
				.status(400)
				.send({ error: "invalid_request", message: parsed.error.errors.map((e) => e.message).join("; ") });
		}

		try {
			const { record, sync } = await coordinator.refresh(parsed.data);
			return reply.send({
				success: true,
				expires_at: toIso(record.expiresAt),
				expires_in_seconds: Math.round((record.expiresAt - now()) / 1000),
				last_refreshed_at: toIso(record.lastRefreshedAt),
				sync,
			});
		} catch (err) {
			return sendError(request, reply, err);
		}
	});

	// ─── GET /admin/oauth/authorize-url ────────────────────────────────────────
	server.get("/admin/oauth/authorize-url", { preHandler: requireAdmin }, async (request, reply) => {
		const parsed = AuthorizeQuerySchema.safeParse(request.query ?? {});
		if (!parsed.success) {
			return reply.status(400).send({ error: "invalid_request", message: "state must be 1-256 characters" });
		}
		try {
			return reply.send({ url: coordinator.getAuthorizationUrl(parsed.data.state) });
		} catch (err) {
			return sendError(request, reply, err);
		}
	});

	// ─── POST /admin/oauth/exchange ────────────────────────────────────────────
	server.post("/admin/oauth/exchange", { preHandler: requireAdmin }, async (request, reply) => {
		const parsed = ExchangeBodySchema.safeParse(request.body ?? {});
		if (!parsed.success) {
			return reply
				.status(400)
				.send({ error: "invalid_request", message: "body must be { code: string, sync?: boolean }" });
		}

		try {
			const { record, sync } = await coordinator.exchangeCode(parsed.data.code, {
				sync: parsed.data.sync,
			});
			return reply.send({
				success: true,
				access_token: maskSecret(record.accessToken),
				refresh_token: maskSecret(record.refreshToken),
				expires_at: toIso(record.expiresAt),
				user_id: record.userId ?? null,
				sync,
			});
		} catch (err) {
			return sendError(request, reply, err);
		}
	});

	// ─── GET /admin/scheduler/status ───────────────────────────────────────────
	server.get("/admin/scheduler/status", { preHandler: requireAdmin }, async (_request, reply) => {
		const status = scheduler?.getStatus();
		return reply.send({
			enabled: scheduler !== undefined,
			running: status?.running ?? false,
			tick_in_progress: status?.tickInProgress ?? false,
			interval_ms: status?.intervalMs ?? null,
			last_tick_at: toIsoOrNull(status?.lastTickAt ?? null),
			last_outcome: status?.lastOutcome ?? null,
		});
	});

	// ─── GET /admin/config ─────────────────────────────────────────────────────
	server.get("/admin/config", { preHandler: requireAdmin }, async (_request, reply) => {
		return reply.send({
			withings_client_id: configSummary.withingsClientId,
			withings_client_secret: configSummary.withingsClientSecret,
			encryption_key: configSummary.encryptionKey,
			admin_token: configSummary.adminToken,
			railway: {
				api_token: configSummary.railway.apiToken,
				project_id: configSummary.railway.projectId,
				environment_id: configSummary.railway.environmentId,
				service_id: configSummary.railway.serviceId,
			},
			auto_refresh: configSummary.autoRefresh,
			sync_enabled: configSummary.syncEnabled,
			look_ahead_minutes: configSummary.lookAheadMinutes,
			interval_minutes: configSummary.intervalMinutes,
		});
	});

	return server;
}
