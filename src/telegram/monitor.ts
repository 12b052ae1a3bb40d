import dns from "node:dns";

import type { RelaySettings } from "../config/settings.js";
import { getChildLogger } from "../logging.js";
import type { RuntimeEnv } from "../runtime.js";
import { type AccessGuard, createAccessGuard } from "../security/access.js";
import { createRateLimiter } from "../security/rate-limit.js";
import { type GenerationBackend, OllamaClient } from "../services/ollama-client.js";
import { createTelegramBot } from "./client.js";
import { Dispatcher } from "./dispatcher.js";
import { IntakeLoop } from "./intake.js";
import { TelegramTransport } from "./transport.js";
import type { ChatTransport } from "./types.js";

const logger = getChildLogger({ module: "telegram-monitor" });

const MIN_SWEEP_INTERVAL_MS = 1_000;
const MAX_SWEEP_INTERVAL_MS = 3_600_000;

/**
 * Sweep once per rate-limit window, kept within bounds Node's timers accept.
 */
export function resolveSweepIntervalMs(windowMs: number): number {
	return Math.min(Math.max(windowMs, MIN_SWEEP_INTERVAL_MS), MAX_SWEEP_INTERVAL_MS);
}

export type RelayComponents = {
	accessGuard: AccessGuard;
	dispatcher: Dispatcher;
	intake: IntakeLoop;
	/** Stops background housekeeping. */
	dispose: () => void;
};

/**
 * Wire the relay around an existing transport and backend.
 */
export function createRelay(options: {
	settings: RelaySettings;
	transport: ChatTransport;
	backend: GenerationBackend;
	botUsername?: string;
}): RelayComponents {
	const { settings, transport, backend } = options;

	const accessGuard = createAccessGuard(settings.allowedUsers);
	const rateLimiter = createRateLimiter(settings.rateLimit);

	const dispatcher = new Dispatcher({
		transport,
		backend,
		accessGuard,
		rateLimiter,
		maxPromptLength: settings.maxPromptLength,
		chunkSize: settings.chunkSize,
		chunkDelayMs: settings.chunkDelayMs,
		botUsername: options.botUsername,
	});

	const intake = new IntakeLoop({
		transport,
		onEvent: async (event) => {
			await dispatcher.dispatch(event);
		},
		pollTimeoutSeconds: settings.polling.timeoutSeconds,
		fetchTimeoutMs: settings.polling.fetchTimeoutMs,
		retryDelayMs: settings.polling.retryDelayMs,
	});

	// Idle senders would otherwise stay in the limiter map forever
	const sweepInterval = setInterval(() => {
		const dropped = rateLimiter.sweep();
		if (dropped > 0) {
			logger.debug({ dropped, tracked: rateLimiter.size }, "rate limiter swept");
		}
	}, resolveSweepIntervalMs(settings.rateLimit.windowMs));
	sweepInterval.unref();

	return {
		accessGuard,
		dispatcher,
		intake,
		dispose: () => clearInterval(sweepInterval),
	};
}

export type MonitorOptions = {
	settings: RelaySettings;
	token: string;
	verbose: boolean;
	abortSignal?: AbortSignal;
};

/**
 * Connect to Telegram and Ollama and relay messages until the signal fires.
 */
export async function monitorTelegramRelay(
	options: MonitorOptions,
	runtime: RuntimeEnv,
): Promise<void> {
	const { settings, token, verbose, abortSignal } = options;

	if (settings.ipFamily === 4) {
		// Ollama listens on 127.0.0.1 by default; "localhost" must not resolve to ::1 first
		dns.setDefaultResultOrder("ipv4first");
	}

	runtime.log("Connecting to Telegram...");
	const { bot, botInfo } = await createTelegramBot({ token, ipFamily: settings.ipFamily });
	runtime.log(`Connected as @${botInfo.username ?? botInfo.first_name}`);

	const transport = new TelegramTransport({
		api: bot.api,
		token,
		sendTimeoutMs: settings.sendTimeoutMs,
	});
	const backend = new OllamaClient({
		baseUrl: settings.ollama.url,
		model: settings.ollama.model,
		timeoutMs: settings.ollama.timeoutMs,
	});

	const { accessGuard, intake, dispose } = createRelay({
		settings,
		transport,
		backend,
		botUsername: botInfo.username,
	});

	if (accessGuard.isOpen) {
		runtime.error(
			"Warning: no allowed users configured - the bot will answer ANYONE. Set ALLOWED_USER_IDS to restrict access.",
		);
		logger.warn("access guard in open mode");
	}

	logger.info(
		{
			botId: botInfo.id,
			model: settings.ollama.model,
			ollamaUrl: settings.ollama.url,
			allowedUsers: settings.allowedUsers.length,
			verbose,
		},
		"relay started",
	);
	runtime.log("Listening for Telegram messages. Ctrl+C to stop.");

	try {
		await intake.run(abortSignal);
	} finally {
		dispose();
		logger.info("relay stopped");
	}
}
