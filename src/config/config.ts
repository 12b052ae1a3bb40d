import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { TELEGRAM_API_CHAR_LIMIT } from "../telegram/constants.js";
import { parseTelegramId } from "../utils.js";
import { resolveConfigPath } from "./path.js";

const TelegramIdSchema = z
	.union([z.number().int(), z.string()])
	.refine((value) => parseTelegramId(value) !== null, {
		message: "must be a numeric Telegram user ID",
	});

// Long-poll settings. The client timeout has to outlive the server-side wait,
// otherwise every empty poll would surface as a network failure.
const PollingConfigSchema = z
	.object({
		timeoutSeconds: z.number().int().positive().default(30),
		fetchTimeoutMs: z.number().int().positive().default(40_000),
		retryDelayMs: z.number().int().min(0).default(5_000),
	})
	.refine((polling) => polling.fetchTimeoutMs > polling.timeoutSeconds * 1000, {
		message: "fetchTimeoutMs must be greater than timeoutSeconds * 1000",
		path: ["fetchTimeoutMs"],
	});

const TelegramConfigSchema = z.object({
	botToken: z.string().optional(),
	// Empty list = every sender is served (open mode)
	allowedUsers: z.array(TelegramIdSchema).default([]),
	polling: PollingConfigSchema.optional(),
	sendTimeoutMs: z.number().int().positive().default(10_000),
	chunkSize: z.number().int().positive().max(TELEGRAM_API_CHAR_LIMIT).default(4000),
	chunkDelayMs: z.number().int().min(0).default(100),
	// 0 = let the OS pick; 4/6 pins the Bot API connection to one address family
	ipFamily: z.union([z.literal(0), z.literal(4), z.literal(6)]).default(4),
});

const OllamaConfigSchema = z.object({
	url: z.string().url().optional(),
	model: z.string().min(1).optional(),
	timeoutSeconds: z.number().int().positive().default(480),
});

const LimitsConfigSchema = z.object({
	rateLimit: z
		.object({
			maxRequests: z.number().int().positive().default(10),
			windowSeconds: z.number().positive().default(60),
		})
		.optional(),
	maxPromptLength: z.number().int().positive().default(4096),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const RelayConfigSchema = z.object({
	telegram: TelegramConfigSchema.optional(),
	ollama: OllamaConfigSchema.optional(),
	limits: LimitsConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

let cachedConfig: RelayConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): RelayConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const parsed: unknown = JSON5.parse(raw);
		const validated = RelayConfigSchema.parse(parsed);

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			// No config file - use defaults
			return {};
		}
		throw err;
	}
}

/**
 * Get the current config file path being used.
 */
export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
