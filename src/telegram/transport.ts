import { GrammyError, HttpError } from "grammy";
import type { Update } from "grammy/types";

import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import { retryAsync } from "../infra/retry.js";
import { createTimeoutSignal } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { redactSecrets } from "../security/redact.js";
import { SEND_TIMEOUT_MS } from "./constants.js";
import type { ChatTransport, FetchEventsOptions, InboundEvent } from "./types.js";

const logger = getChildLogger({ module: "telegram-transport" });

/**
 * The slice of grammy's Api the transport calls.
 */
export type TelegramApi = {
	getUpdates(
		other?: { offset?: number; timeout?: number; allowed_updates?: readonly string[] },
		signal?: AbortSignal,
	): Promise<Update[]>;
	sendMessage(chatId: number, text: string, other?: undefined, signal?: AbortSignal): Promise<unknown>;
};

export type TelegramTransportOptions = {
	api: TelegramApi;
	/** Bot token, scrubbed from every error message. */
	token: string;
	sendTimeoutMs?: number;
	sendRetry?: {
		maxAttempts?: number;
		delayMs?: number;
	};
};

/**
 * Bot API failure with the token removed from its message.
 */
export class TransportError extends Error {
	constructor(
		message: string,
		public readonly method: string,
		public readonly transient: boolean,
		public readonly status?: number,
	) {
		super(message);
		this.name = "TransportError";
	}
}

/**
 * Map a Bot API update to an inbound event. Only text is taken as the
 * message body; captions and media are not prompts.
 */
export function toInboundEvent(update: Update): InboundEvent {
	const message = update.message;
	if (!message) {
		return { sequenceId: update.update_id };
	}

	return {
		sequenceId: update.update_id,
		message: {
			messageId: message.message_id,
			senderIdentity: message.from?.id ?? message.chat.id,
			chatDestination: message.chat.id,
			rawText: message.text ?? "",
			receivedAt: message.date * 1000,
			chatType: message.chat.type,
			username: message.from?.username,
		},
	};
}

export class TelegramTransport implements ChatTransport {
	private readonly api: TelegramApi;
	private readonly secrets: readonly string[];
	private readonly sendTimeoutMs: number;
	private readonly sendMaxAttempts: number;
	private readonly sendRetryDelayMs: number;

	constructor(options: TelegramTransportOptions) {
		this.api = options.api;
		this.secrets = [options.token];
		this.sendTimeoutMs = options.sendTimeoutMs ?? SEND_TIMEOUT_MS;
		this.sendMaxAttempts = options.sendRetry?.maxAttempts ?? 3;
		this.sendRetryDelayMs = options.sendRetry?.delayMs ?? 1000;
	}

	async fetchEvents(offset: number, options: FetchEventsOptions): Promise<InboundEvent[]> {
		const { signal, clear } = createTimeoutSignal(options.timeoutMs, "getUpdates");
		try {
			const updates = await this.api.getUpdates(
				{ offset, timeout: options.waitSeconds, allowed_updates: ["message"] },
				signal,
			);
			return updates.map(toInboundEvent);
		} catch (err) {
			throw this.toTransportError("getUpdates", err);
		} finally {
			clear();
		}
	}

	async sendText(destination: number, text: string): Promise<void> {
		await retryAsync(() => this.sendOnce(destination, text), {
			maxAttempts: this.sendMaxAttempts,
			delayMs: this.sendRetryDelayMs,
			shouldRetry: (err) => err instanceof TransportError && err.transient,
			onRetry: (err, info) => {
				logger.warn(
					{ chatId: destination, attempt: info.attempt, error: formatErrorSafe(err) },
					"sendMessage failed, retrying",
				);
			},
		});
	}

	private async sendOnce(destination: number, text: string): Promise<void> {
		const { signal, clear } = createTimeoutSignal(this.sendTimeoutMs, "sendMessage");
		try {
			await this.api.sendMessage(destination, text, undefined, signal);
		} catch (err) {
			throw this.toTransportError("sendMessage", err);
		} finally {
			clear();
		}
	}

	private toTransportError(method: string, err: unknown): TransportError {
		if (err instanceof GrammyError) {
			const status = err.error_code;
			return new TransportError(
				this.redact(`${method} failed (${status}): ${err.description}`),
				method,
				status === 429 || status >= 500,
				status,
			);
		}
		if (err instanceof HttpError) {
			return new TransportError(
				this.redact(`${method} failed: ${formatErrorSafe(err.error)}`),
				method,
				true,
			);
		}
		return new TransportError(
			this.redact(`${method} failed: ${formatErrorSafe(err)}`),
			method,
			isTransientNetworkError(err),
		);
	}

	private redact(message: string): string {
		return redactSecrets(message, this.secrets);
	}
}
