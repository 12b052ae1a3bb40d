import { sleep } from "../utils.js";

export type RetryOptions = {
	/** Attempts including the first. Defaults to 3; values below 1 mean one attempt. */
	maxAttempts?: number;
	/** Fixed wait between attempts. Defaults to 1000 ms. */
	delayMs?: number;
	/** Return true if the error is worth another attempt. Defaults to always-retry. */
	shouldRetry?: (err: unknown) => boolean;
	/** Called before each retry sleep. */
	onRetry?: (err: unknown, info: RetryInfo) => void;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	maxAttempts: number;
	delayMs: number;
};

/**
 * Run an async operation up to maxAttempts times with a fixed delay between
 * attempts. The last error is rethrown unchanged once attempts run out or
 * shouldRetry declines.
 *
 * @example
 * ```ts
 * await retryAsync(() => api.sendMessage(chatId, text), {
 *   maxAttempts: 3,
 *   shouldRetry: (err) => isTransientNetworkError(err),
 * });
 * ```
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
	const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts ?? 3));
	const delayMs = Math.max(0, opts.delayMs ?? 1000);

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (attempt >= maxAttempts || (opts.shouldRetry && !opts.shouldRetry(err))) {
				throw err;
			}

			opts.onRetry?.(err, { attempt, maxAttempts, delayMs });

			if (delayMs > 0) {
				await sleep(delayMs);
			}
		}
	}
}
