import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { sleepWithAbort } from "../utils.js";
import { FETCH_RETRY_DELAY_MS, FETCH_TIMEOUT_MS, LONG_POLL_TIMEOUT_SECONDS } from "./constants.js";
import type { ChatTransport, InboundEvent } from "./types.js";

const logger = getChildLogger({ module: "telegram-intake" });

export type IntakeLoopOptions = {
	transport: ChatTransport;
	onEvent: (event: InboundEvent) => Promise<void>;
	pollTimeoutSeconds?: number;
	fetchTimeoutMs?: number;
	retryDelayMs?: number;
	/** Highest sequence id already handled. 0 means none. */
	initialWatermark?: number;
};

/**
 * Long-poll loop. Owns the watermark; events are handed to onEvent one at a
 * time, in delivery order.
 */
export class IntakeLoop {
	private readonly transport: ChatTransport;
	private readonly onEvent: (event: InboundEvent) => Promise<void>;
	private readonly pollTimeoutSeconds: number;
	private readonly fetchTimeoutMs: number;
	private readonly retryDelayMs: number;
	private watermark: number;

	constructor(options: IntakeLoopOptions) {
		this.transport = options.transport;
		this.onEvent = options.onEvent;
		this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? LONG_POLL_TIMEOUT_SECONDS;
		this.fetchTimeoutMs = options.fetchTimeoutMs ?? FETCH_TIMEOUT_MS;
		this.retryDelayMs = options.retryDelayMs ?? FETCH_RETRY_DELAY_MS;
		this.watermark = options.initialWatermark ?? 0;

		if (this.fetchTimeoutMs <= this.pollTimeoutSeconds * 1000) {
			throw new Error(
				`fetch timeout (${this.fetchTimeoutMs}ms) must exceed the long-poll wait (${this.pollTimeoutSeconds}s)`,
			);
		}
	}

	getWatermark(): number {
		return this.watermark;
	}

	nextOffset(): number {
		return this.watermark + 1;
	}

	/**
	 * Fetch one batch and process it. Fetch errors propagate; dispatch errors
	 * do not.
	 */
	async pollOnce(): Promise<number> {
		const events = await this.transport.fetchEvents(this.nextOffset(), {
			waitSeconds: this.pollTimeoutSeconds,
			timeoutMs: this.fetchTimeoutMs,
		});
		await this.processBatch(events);
		return events.length;
	}

	async processBatch(events: readonly InboundEvent[]): Promise<void> {
		for (const event of events) {
			// Advance first: an event that crashes dispatch is not redelivered
			if (event.sequenceId > this.watermark) {
				this.watermark = event.sequenceId;
			}

			try {
				await this.onEvent(event);
			} catch (err) {
				logger.error(
					{ sequenceId: event.sequenceId, error: formatErrorSafe(err) },
					"event dispatch failed",
				);
			}
		}
	}

	/**
	 * Poll until the signal fires. The fetch in flight is left to finish (it is
	 * bounded by fetchTimeoutMs); the backoff wait is cut short.
	 */
	async run(signal?: AbortSignal): Promise<void> {
		logger.info({ offset: this.nextOffset() }, "intake loop started");

		while (true) {
			if (signal?.aborted) break;

			try {
				const count = await this.pollOnce();
				if (count > 0) {
					logger.debug({ count, watermark: this.watermark }, "batch processed");
				}
			} catch (err) {
				logger.error(
					{ error: formatErrorSafe(err), retryInMs: this.retryDelayMs },
					"failed to fetch updates",
				);
				try {
					await sleepWithAbort(this.retryDelayMs, signal);
				} catch {
					break;
				}
			}
		}

		logger.info({ watermark: this.watermark }, "intake loop stopped");
	}
}
