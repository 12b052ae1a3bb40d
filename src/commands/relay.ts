import type { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { resolveRelaySettings } from "../config/settings.js";
import { readEnv } from "../env.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { defaultRuntime } from "../runtime.js";
import { monitorTelegramRelay } from "../telegram/monitor.js";

const logger = getChildLogger({ module: "cmd-relay" });

export function registerRelayCommand(program: Command): void {
	program
		.command("relay")
		.description("Start relaying Telegram messages to Ollama")
		.action(async () => {
			const verbose = Boolean(program.opts().verbose);

			try {
				const cfg = loadConfig();
				const { telegramBotToken } = readEnv();
				const settings = resolveRelaySettings(cfg, {
					onInvalidEnv: (name, value) => {
						console.warn(`Warning: ignoring invalid ${name}=${value}`);
						logger.warn({ name, value }, "ignoring invalid environment override");
					},
				});

				installUnhandledRejectionHandler("relay");

				console.log("Starting ollama-relay...");
				console.log(`  Ollama: ${settings.ollama.url} (model ${settings.ollama.model})`);
				console.log(
					`  Rate limit: ${settings.rateLimit.maxRequests} requests per ${settings.rateLimit.windowMs / 1000}s`,
				);
				console.log(`  Max prompt length: ${settings.maxPromptLength} characters`);
				if (settings.allowedUsers.length > 0) {
					console.log(`  Allowed users: ${settings.allowedUsers.join(", ")}`);
				} else {
					console.log("  Allowed users: everyone (open mode)");
				}

				const abortController = new AbortController();

				const shutdown = () => {
					if (abortController.signal.aborted) return;
					console.log("\nShutting down (finishing the current poll)...");
					abortController.abort();
				};

				process.on("SIGINT", shutdown);
				process.on("SIGTERM", shutdown);

				await monitorTelegramRelay(
					{
						settings,
						token: telegramBotToken,
						verbose,
						abortSignal: abortController.signal,
					},
					defaultRuntime,
				);

				process.off("SIGINT", shutdown);
				process.off("SIGTERM", shutdown);
				console.log("Relay stopped.");
			} catch (err) {
				const message = formatErrorSafe(err);
				logger.error({ error: message }, "relay command failed");
				console.error(`Error: ${message}`);
				process.exit(1);
			}
		});
}
