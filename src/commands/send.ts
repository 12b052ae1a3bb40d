import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { resolveRelaySettings } from "../config/settings.js";
import { readEnv } from "../env.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { buildTelegramBot } from "../telegram/client.js";
import { splitMessage } from "../telegram/split.js";
import { TelegramTransport } from "../telegram/transport.js";
import type { ChatTransport } from "../telegram/types.js";
import { parseTelegramId, sleep } from "../utils.js";

const logger = getChildLogger({ module: "cmd-send" });

/**
 * Send text to a chat, split the same way relay replies are. Returns the
 * number of messages sent.
 */
export async function sendChunked(
	transport: ChatTransport,
	chatId: number,
	text: string,
	chunkSize: number,
	chunkDelayMs: number,
): Promise<number> {
	const chunks = splitMessage(text, chunkSize);
	for (const [index, chunk] of chunks.entries()) {
		if (index > 0 && chunkDelayMs > 0) {
			await sleep(chunkDelayMs);
		}
		await transport.sendText(chatId, chunk);
	}
	return chunks.length;
}

export function registerSendCommand(program: Command): void {
	program
		.command("send")
		.description("Send a message to a Telegram chat")
		.argument("<chatId>", "Telegram chat ID (numeric)")
		.argument("<message>", "Message text to send")
		.action(async (chatId: string, message: string) => {
			const verbose = Boolean(program.opts().verbose);

			try {
				const numericChatId = parseTelegramId(chatId);
				if (numericChatId === null) {
					console.error("Error: chatId must be a numeric value");
					process.exit(1);
				}

				if (!message.trim()) {
					console.error("Error: message must not be empty");
					process.exit(1);
				}

				const { telegramBotToken } = readEnv();
				const settings = resolveRelaySettings(loadConfig());

				if (verbose) {
					console.log(`Sending to chat ${numericChatId}...`);
				}

				const bot = buildTelegramBot({ token: telegramBotToken, ipFamily: settings.ipFamily });
				const transport = new TelegramTransport({
					api: bot.api,
					token: telegramBotToken,
					sendTimeoutMs: settings.sendTimeoutMs,
				});

				const count = await sendChunked(
					transport,
					numericChatId,
					message,
					settings.chunkSize,
					settings.chunkDelayMs,
				);
				console.log(count === 1 ? "Message sent." : `Message sent in ${count} parts.`);
			} catch (err) {
				const messageText = formatErrorSafe(err);
				logger.error({ error: messageText }, "send command failed");
				console.error(`Error: ${messageText}`);
				process.exit(1);
			}
		});
}
