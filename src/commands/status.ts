import fs from "node:fs";
import type { Command } from "commander";
import { getConfigPath, loadConfig } from "../config/config.js";
import { resolveRelaySettings } from "../config/settings.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { OllamaClient } from "../services/ollama-client.js";
import { validateBotToken } from "../telegram/client.js";
import { formatBotInfo } from "../telegram/types.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Check the bot token, Ollama and the effective configuration")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const hasConfig = fs.existsSync(configPath);
				const cfg = loadConfig();
				const settings = resolveRelaySettings(cfg);

				const tokenFromConfig = cfg.telegram?.botToken;
				const tokenFromEnv = process.env.TELEGRAM_BOT_TOKEN;
				const token = tokenFromConfig || tokenFromEnv;
				const tokenSource = tokenFromConfig ? "config" : tokenFromEnv ? "env" : null;

				const botInfo = token ? await validateBotToken(token, settings.ipFamily) : null;

				const ollama = new OllamaClient({
					baseUrl: settings.ollama.url,
					model: settings.ollama.model,
					timeoutMs: 5_000,
				});
				let models: string[] | null = null;
				let ollamaError: string | null = null;
				try {
					models = await ollama.listModels();
				} catch (err) {
					ollamaError = formatErrorSafe(err);
					logger.debug({ error: ollamaError }, "ollama unreachable");
				}

				const status = {
					config: {
						path: configPath,
						exists: hasConfig,
					},
					telegram: {
						token: tokenSource ? `set (${tokenSource})` : "not set",
						bot: botInfo ? formatBotInfo(botInfo) : null,
						allowedUsers: settings.allowedUsers,
					},
					ollama: {
						url: settings.ollama.url,
						model: settings.ollama.model,
						reachable: models !== null,
						modelInstalled: models?.some((name) => name === settings.ollama.model) ?? false,
						error: ollamaError,
					},
					limits: {
						rateLimit: settings.rateLimit,
						maxPromptLength: settings.maxPromptLength,
					},
				};

				if (opts.json) {
					console.log(JSON.stringify(status, null, 2));
					return;
				}

				console.log("=== ollama-relay status ===\n");

				console.log("Configuration:");
				console.log(`  Path: ${status.config.path}`);
				console.log(`  Exists: ${status.config.exists ? "yes" : "no"}`);
				console.log();

				console.log("Telegram:");
				console.log(`  TELEGRAM_BOT_TOKEN: ${status.telegram.token}`);
				if (token) {
					console.log(`  Token check: ${status.telegram.bot ?? "failed"}`);
				}
				if (status.telegram.allowedUsers.length > 0) {
					console.log(`  Allowed users: ${status.telegram.allowedUsers.join(", ")}`);
				} else {
					console.log("  Allowed users: everyone (open mode)");
				}
				console.log();

				console.log("Ollama:");
				console.log(`  URL: ${status.ollama.url}`);
				console.log(`  Model: ${status.ollama.model}`);
				if (status.ollama.reachable) {
					console.log(`  Installed: ${status.ollama.modelInstalled ? "yes" : "no"}`);
				} else {
					console.log(`  Unreachable: ${status.ollama.error}`);
				}
				console.log();

				console.log("Limits:");
				console.log(
					`  Rate limit: ${status.limits.rateLimit.maxRequests} per ${status.limits.rateLimit.windowMs / 1000}s`,
				);
				console.log(`  Max prompt length: ${status.limits.maxPromptLength}`);
			} catch (err) {
				const message = formatErrorSafe(err);
				logger.error({ error: message }, "status command failed");
				console.error(`Error: ${message}`);
				process.exit(1);
			}
		});
}
