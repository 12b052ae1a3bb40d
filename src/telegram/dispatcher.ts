import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { AccessGuard } from "../security/access.js";
import type { SlidingWindowRateLimiter } from "../security/rate-limit.js";
import type { GenerationBackend } from "../services/ollama-client.js";
import { sleep } from "../utils.js";
import { CHUNK_DELAY_MS, CONTINUATION_MARKER, DEFAULT_CHUNK_SIZE } from "./constants.js";
import {
	EMPTY_RESPONSE_MESSAGE,
	GENERATION_FAILED_MESSAGE,
	HELP_MESSAGE,
	PROCESSING_MESSAGE,
	RATE_LIMITED_MESSAGE,
	START_MESSAGE,
	promptTooLongMessage,
} from "./messages.js";
import { segmentReply } from "./split.js";
import type { ChatTransport, InboundEvent, InboundMessage } from "./types.js";

const logger = getChildLogger({ module: "telegram-dispatcher" });

export type DispatcherOptions = {
	transport: ChatTransport;
	backend: GenerationBackend;
	accessGuard: AccessGuard;
	rateLimiter: SlidingWindowRateLimiter;
	maxPromptLength: number;
	chunkSize?: number;
	chunkDelayMs?: number;
	/** Lets "/help@<botUsername>" match in group chats. */
	botUsername?: string;
	continuationMarker?: string;
};

export type DispatchOutcome =
	| "ignored"
	| "denied"
	| "command"
	| "rate_limited"
	| "too_long"
	| "failed"
	| "empty"
	| "replied";

const COMMAND_REPLIES: Record<string, string> = {
	"/start": START_MESSAGE,
	"/help": HELP_MESSAGE,
};

/**
 * Handles one inbound event: access, commands, limits, generation, reply.
 * Never throws; every failure ends in a log entry.
 */
export class Dispatcher {
	private readonly transport: ChatTransport;
	private readonly backend: GenerationBackend;
	private readonly accessGuard: AccessGuard;
	private readonly rateLimiter: SlidingWindowRateLimiter;
	private readonly maxPromptLength: number;
	private readonly chunkSize: number;
	private readonly chunkDelayMs: number;
	private readonly botUsername?: string;
	private readonly continuationMarker: string;

	constructor(options: DispatcherOptions) {
		this.transport = options.transport;
		this.backend = options.backend;
		this.accessGuard = options.accessGuard;
		this.rateLimiter = options.rateLimiter;
		this.maxPromptLength = options.maxPromptLength;
		this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
		this.chunkDelayMs = options.chunkDelayMs ?? CHUNK_DELAY_MS;
		this.botUsername = options.botUsername?.toLowerCase();
		this.continuationMarker = options.continuationMarker ?? CONTINUATION_MARKER;
	}

	async dispatch(event: InboundEvent): Promise<DispatchOutcome> {
		const msg = event.message;
		if (!msg || msg.chatDestination === 0 || !msg.rawText) {
			return "ignored";
		}

		if (!this.accessGuard.isAllowed(msg.senderIdentity)) {
			logger.warn(
				{ senderId: msg.senderIdentity, chatId: msg.chatDestination, username: msg.username },
				"unauthorized sender",
			);
			return "denied";
		}

		const commandReply = this.matchCommand(msg.rawText);
		if (commandReply !== undefined) {
			await this.send(msg.chatDestination, commandReply);
			return "command";
		}

		return this.handlePrompt(msg);
	}

	private matchCommand(text: string): string | undefined {
		const [command, mention] = text.split("@", 2);
		if (mention !== undefined && mention.toLowerCase() !== this.botUsername) {
			return undefined;
		}
		return Object.hasOwn(COMMAND_REPLIES, command) ? COMMAND_REPLIES[command] : undefined;
	}

	private async handlePrompt(msg: Readonly<InboundMessage>): Promise<DispatchOutcome> {
		const chatId = msg.chatDestination;

		if (!this.rateLimiter.checkAndRecord(msg.senderIdentity)) {
			logger.info({ senderId: msg.senderIdentity, chatId }, "rate limited");
			await this.send(chatId, RATE_LIMITED_MESSAGE);
			return "rate_limited";
		}

		if (msg.rawText.length > this.maxPromptLength) {
			logger.info(
				{ senderId: msg.senderIdentity, length: msg.rawText.length, max: this.maxPromptLength },
				"prompt too long",
			);
			await this.send(chatId, promptTooLongMessage(this.maxPromptLength));
			return "too_long";
		}

		logger.info(
			{ senderId: msg.senderIdentity, chatId, length: msg.rawText.length },
			"forwarding prompt",
		);
		await this.send(chatId, PROCESSING_MESSAGE);

		let reply: string;
		try {
			reply = await this.backend.generate(msg.rawText);
		} catch (err) {
			logger.error({ chatId, error: formatErrorSafe(err, 1000) }, "generation failed");
			await this.send(chatId, GENERATION_FAILED_MESSAGE);
			return "failed";
		}

		if (!reply.trim()) {
			logger.warn({ chatId }, "empty generation");
			await this.send(chatId, EMPTY_RESPONSE_MESSAGE);
			return "empty";
		}

		const chunks = segmentReply(reply, this.chunkSize, this.continuationMarker);
		for (const [index, chunk] of chunks.entries()) {
			if (index > 0 && this.chunkDelayMs > 0) {
				await sleep(this.chunkDelayMs);
			}
			await this.send(chatId, chunk);
		}

		logger.debug({ chatId, chunks: chunks.length, length: reply.length }, "reply sent");
		return "replied";
	}

	/** Send one message; failures are logged and not rethrown. */
	private async send(chatId: number, text: string): Promise<void> {
		try {
			await this.transport.sendText(chatId, text);
		} catch (err) {
			logger.error({ chatId, error: formatErrorSafe(err) }, "failed to send message");
		}
	}
}
