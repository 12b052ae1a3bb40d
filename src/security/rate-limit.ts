/**
 * In-memory sliding-window rate limiter, keyed by sender identity.
 *
 * Every sender's window lives in one map. checkAndRecord() never awaits, so
 * each call runs as a single uninterrupted critical section over that map:
 * calls are serialized across all senders, not just per sender.
 */

export type RateLimiterOptions = {
	/** Accepted requests allowed per window. */
	maxRequests: number;
	windowMs: number;
	/** Clock in epoch milliseconds. */
	now?: () => number;
};

export class SlidingWindowRateLimiter {
	private readonly windows = new Map<number, number[]>();
	private readonly maxRequests: number;
	private readonly windowMs: number;
	private readonly now: () => number;

	constructor(options: RateLimiterOptions) {
		this.maxRequests = Math.max(1, Math.floor(options.maxRequests));
		this.windowMs = Math.max(1, options.windowMs);
		this.now = options.now ?? Date.now;
	}

	/**
	 * Decide whether one more request from this sender fits in the window,
	 * recording it when it does.
	 */
	checkAndRecord(senderIdentity: number): boolean {
		const now = this.now();
		const windowStart = now - this.windowMs;

		const recent = (this.windows.get(senderIdentity) ?? []).filter((ts) => ts > windowStart);

		if (recent.length >= this.maxRequests) {
			// Keep the pruned list so the next call does not redo the filtering
			this.windows.set(senderIdentity, recent);
			return false;
		}

		recent.push(now);
		this.windows.set(senderIdentity, recent);
		return true;
	}

	/**
	 * Forget senders with no requests left in the window. Returns how many
	 * were dropped.
	 */
	sweep(): number {
		const windowStart = this.now() - this.windowMs;
		let dropped = 0;
		for (const [senderIdentity, timestamps] of this.windows) {
			if (timestamps.every((ts) => ts <= windowStart)) {
				this.windows.delete(senderIdentity);
				dropped++;
			}
		}
		return dropped;
	}

	/** Number of senders currently tracked. */
	get size(): number {
		return this.windows.size;
	}
}

export function createRateLimiter(options: RateLimiterOptions): SlidingWindowRateLimiter {
	return new SlidingWindowRateLimiter(options);
}
