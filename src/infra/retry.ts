import { sleep } from "../utils.js";

export type BackoffPolicy = {
	/** Attempts including the first one. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	factor: number;
	/** Fraction of the delay randomized in either direction (0 to 1). */
	jitter: number;
};

export type RetryAttempt = {
	/** 1-based number of the attempt that just failed. */
	attempt: number;
	maxAttempts: number;
	delayMs: number;
};

export type RetryOptions = Partial<BackoffPolicy> & {
	/** Returning false rethrows the error at once. Every error is retried when omitted. */
	shouldRetry?: (err: unknown, attempt: RetryAttempt) => boolean;
	onRetry?: (err: unknown, attempt: RetryAttempt) => void;
};

const clamp = (value: number, min: number, max = Number.POSITIVE_INFINITY) =>
	Math.min(max, Math.max(min, value));

export function resolveBackoffPolicy(opts: Partial<BackoffPolicy> = {}): BackoffPolicy {
	return {
		maxAttempts: clamp(opts.maxAttempts ?? 3, 1),
		baseDelayMs: clamp(opts.baseDelayMs ?? 1000, 0),
		maxDelayMs: clamp(opts.maxDelayMs ?? 30_000, 0),
		factor: clamp(opts.factor ?? 2, 1),
		jitter: clamp(opts.jitter ?? 0.25, 0, 1),
	};
}

export function backoffDelay(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
	const exponential = Math.min(policy.baseDelayMs * policy.factor ** (attempt - 1), policy.maxDelayMs);
	const spread = exponential * policy.jitter * (random() * 2 - 1);
	return Math.max(0, Math.round(exponential + spread));
}

/**
 * Runs `fn` until it resolves or the attempts run out, sleeping with
 * exponential backoff in between. Rethrows the last error.
 *
 * Only wrap idempotent calls. The vendor refresh call is never retried here:
 * a rotation the vendor accepted but whose response was lost cannot be replayed.
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
	const policy = resolveBackoffPolicy(opts);

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (attempt >= policy.maxAttempts) throw err;

			const info: RetryAttempt = {
				attempt,
				maxAttempts: policy.maxAttempts,
				delayMs: backoffDelay(policy, attempt),
			};
			if (opts.shouldRetry && !opts.shouldRetry(err, info)) throw err;

			opts.onRetry?.(err, info);
			if (info.delayMs > 0) await sleep(info.delayMs);
		}
	}
}
