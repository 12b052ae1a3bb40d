import https from "node:https";

import { autoRetry } from "@grammyjs/auto-retry";
import { Bot } from "grammy";

import type { IpFamily } from "../config/settings.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { BotInfo } from "./types.js";

export type TelegramBotOptions = {
	token: string;
	/** Pin Bot API connections to IPv4 (4) or IPv6 (6); 0 leaves it to the OS. */
	ipFamily?: IpFamily;
};

export type TelegramBotInstance = {
	bot: Bot;
	botInfo: BotInfo;
};

/**
 * Bot without any network call yet. Only the Api is used: the relay runs its
 * own getUpdates loop instead of grammy's polling.
 */
export function buildTelegramBot(options: TelegramBotOptions): Bot {
	const family = options.ipFamily ?? 4;
	const bot = new Bot(options.token, {
		client:
			family === 0
				? undefined
				: {
						baseFetchConfig: {
							agent: new https.Agent({ keepAlive: true, family }),
							compress: true,
						},
					},
	});

	// 429 (flood control) is retried here; network failures are rethrown so the
	// intake loop and sendText apply their own backoff.
	bot.api.config.use(
		autoRetry({
			maxRetryAttempts: 3,
			maxDelaySeconds: 60,
			rethrowInternalServerErrors: true,
			rethrowHttpErrors: true,
		}),
	);

	return bot;
}

/**
 * Create the bot and confirm the token with getMe.
 */
export async function createTelegramBot(options: TelegramBotOptions): Promise<TelegramBotInstance> {
	const logger = getChildLogger({ module: "telegram-client" });

	const bot = buildTelegramBot(options);
	const me = await bot.api.getMe();
	logger.info({ botId: me.id, username: me.username }, "bot authenticated");

	return { bot, botInfo: me };
}

/**
 * Validate a bot token by attempting to get bot info.
 */
export async function validateBotToken(
	token: string,
	ipFamily?: IpFamily,
): Promise<BotInfo | null> {
	try {
		return await buildTelegramBot({ token, ipFamily }).api.getMe();
	} catch (err) {
		getChildLogger({ module: "telegram-client" }).debug(
			{ error: formatErrorSafe(err) },
			"token validation failed",
		);
		return null;
	}
}
