/**
 * Deadline for outbound HTTP calls.
 */

import { isTransientNetworkError } from "./network-errors.js";

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * fetch() followed by `read(response)`, both under one deadline. When it
 * elapses the call rejects with a TimeoutError and the request is aborted, so
 * a server that sends headers and then stalls the body cannot hang the caller.
 * A non-positive or non-finite timeout disables the deadline.
 */
export async function fetchWithTimeout<T>(
	url: string | URL,
	init: Omit<RequestInit, "signal"> | undefined,
	timeoutMs: number,
	read: (response: Response) => Promise<T>,
): Promise<T> {
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		return read(await fetch(url, init));
	}

	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			const err = new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs);
			reject(err);
			controller.abort(err);
		}, timeoutMs);
		timer.unref();
	});

	try {
		return await Promise.race([fetch(url, { ...init, signal: controller.signal }).then(read), deadline]);
	} finally {
		clearTimeout(timer);
	}
}

export type JsonBody = { parsed: true; value: unknown } | { parsed: false; error: unknown };

export type JsonReply = {
	ok: boolean;
	status: number;
	body: JsonBody;
};

async function readJson(response: Response): Promise<JsonBody> {
	try {
		return { parsed: true, value: await response.json() };
	} catch (error) {
		// A connection dropped mid-body is a network failure, not a bad payload
		if (isTransientNetworkError(error)) throw error;
		return { parsed: false, error };
	}
}

/**
 * Status plus parsed JSON body, read within the deadline. A body that is not
 * JSON is reported in `body`, not thrown; network failures still throw.
 */
export function fetchJsonWithTimeout(
	url: string | URL,
	init: Omit<RequestInit, "signal"> | undefined,
	timeoutMs: number,
): Promise<JsonReply> {
	return fetchWithTimeout(url, init, timeoutMs, async (response) => ({
		ok: response.ok,
		status: response.status,
		body: await readJson(response),
	}));
}
