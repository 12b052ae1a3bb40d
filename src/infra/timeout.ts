/**
 * Timeout utilities for outbound HTTP calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type TimeoutSignal = {
	signal: AbortSignal;
	/** Cancel the pending timer once the guarded call has settled. */
	clear: () => void;
};

/**
 * AbortSignal that fires with a TimeoutError after timeoutMs. An external
 * signal, when given, is relayed as well.
 */
export function createTimeoutSignal(
	timeoutMs: number,
	label = "operation",
	external?: AbortSignal | null,
): TimeoutSignal {
	const controller = new AbortController();

	let externalAbortCleanup: (() => void) | undefined;
	if (external) {
		if (external.aborted) {
			controller.abort(external.reason);
		} else {
			const onAbort = () => controller.abort(external.reason);
			external.addEventListener("abort", onAbort, { once: true });
			externalAbortCleanup = () => external.removeEventListener("abort", onAbort);
		}
	}

	let timer: ReturnType<typeof setTimeout> | undefined;
	if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
		timer = setTimeout(() => {
			controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
		}, timeoutMs);
		// Never keep the process alive just for a timeout
		timer.unref();
	}

	return {
		signal: controller.signal,
		clear: () => {
			if (timer) clearTimeout(timer);
			externalAbortCleanup?.();
		},
	};
}

/**
 * fetch() with an AbortController-based timeout. Unlike racing a promise,
 * this aborts the underlying request and frees the socket.
 */
export async function fetchWithTimeout(
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
	fetchImpl: typeof fetch = fetch,
): Promise<Response> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return fetchImpl(url, init);
	}

	const { signal, clear } = createTimeoutSignal(timeoutMs, "fetch", init?.signal);
	try {
		return await fetchImpl(url, { ...init, signal });
	} finally {
		clear();
	}
}
