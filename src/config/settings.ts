/**
 * Effective relay settings: config file values, overridden by environment
 * variables, with defaults filled in.
 */

import { getChildLogger } from "../logging.js";
import { parseTelegramId } from "../utils.js";
import type { RelayConfig } from "./config.js";

const logger = getChildLogger({ module: "settings" });

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_OLLAMA_MODEL = "gemma3:1b";

export type IpFamily = 0 | 4 | 6;

export type RelaySettings = {
	allowedUsers: number[];
	rateLimit: {
		maxRequests: number;
		windowMs: number;
	};
	maxPromptLength: number;
	polling: {
		timeoutSeconds: number;
		fetchTimeoutMs: number;
		retryDelayMs: number;
	};
	sendTimeoutMs: number;
	chunkSize: number;
	chunkDelayMs: number;
	ipFamily: IpFamily;
	ollama: {
		url: string;
		model: string;
		timeoutMs: number;
	};
};

export type ResolveSettingsOptions = {
	env?: NodeJS.ProcessEnv;
	/** Called for every env override that is present but unusable. */
	onInvalidEnv?: (name: string, value: string) => void;
};

const DURATION_UNITS_MS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
};

/**
 * Parse a duration such as "60s", "1m30s", "250ms" or "1.5h" into milliseconds.
 * A bare number is taken as seconds. Returns null for anything else.
 */
export function parseDurationMs(value: string): number | null {
	const trimmed = value.trim();
	if (!trimmed) return null;

	if (/^\d+(\.\d+)?$/.test(trimmed)) {
		return Number.parseFloat(trimmed) * 1000;
	}

	if (!/^(\d+(\.\d+)?(ms|s|m|h))+$/.test(trimmed)) {
		return null;
	}

	let total = 0;
	for (const match of trimmed.matchAll(/(\d+(?:\.\d+)?)(ms|s|m|h)/g)) {
		total += Number.parseFloat(match[1]) * DURATION_UNITS_MS[match[2]];
	}
	return total;
}

function parsePositiveInt(value: string): number | null {
	if (!/^\d+$/.test(value.trim())) return null;
	const parsed = Number.parseInt(value, 10);
	return parsed > 0 ? parsed : null;
}

/**
 * Parse a comma-separated list of Telegram user IDs. Unparseable entries are
 * reported through onInvalid and skipped.
 */
export function parseAllowedUsers(value: string, onInvalid?: (entry: string) => void): number[] {
	const ids: number[] = [];
	for (const entry of value.split(",")) {
		const trimmed = entry.trim();
		if (!trimmed) continue;
		const id = parseTelegramId(trimmed);
		if (id === null) {
			onInvalid?.(trimmed);
			continue;
		}
		ids.push(id);
	}
	return ids;
}

export function resolveRelaySettings(
	config: RelayConfig,
	options: ResolveSettingsOptions = {},
): RelaySettings {
	const env = options.env ?? process.env;
	const onInvalidEnv =
		options.onInvalidEnv ??
		((name: string, value: string) => {
			logger.warn({ name, value }, "ignoring invalid environment override");
		});

	const telegram = config.telegram;
	const limits = config.limits;

	let allowedUsers = (telegram?.allowedUsers ?? [])
		.map((id) => parseTelegramId(id))
		.filter((id): id is number => id !== null);
	const allowedEnv = env.ALLOWED_USER_IDS;
	if (allowedEnv?.trim()) {
		allowedUsers = parseAllowedUsers(allowedEnv, (entry) =>
			onInvalidEnv("ALLOWED_USER_IDS", entry),
		);
	}

	let maxRequests = limits?.rateLimit?.maxRequests ?? 10;
	const maxEnv = env.RATE_LIMIT_MAX;
	if (maxEnv) {
		const parsed = parsePositiveInt(maxEnv);
		if (parsed === null) onInvalidEnv("RATE_LIMIT_MAX", maxEnv);
		else maxRequests = parsed;
	}

	let windowMs = (limits?.rateLimit?.windowSeconds ?? 60) * 1000;
	const windowEnv = env.RATE_LIMIT_WINDOW;
	if (windowEnv) {
		const parsed = parseDurationMs(windowEnv);
		if (parsed === null || parsed <= 0) onInvalidEnv("RATE_LIMIT_WINDOW", windowEnv);
		else windowMs = parsed;
	}

	let maxPromptLength = limits?.maxPromptLength ?? 4096;
	const promptEnv = env.MAX_PROMPT_LENGTH;
	if (promptEnv) {
		const parsed = parsePositiveInt(promptEnv);
		if (parsed === null) onInvalidEnv("MAX_PROMPT_LENGTH", promptEnv);
		else maxPromptLength = parsed;
	}

	const ollamaUrl = env.OLLAMA_URL?.trim() || config.ollama?.url || DEFAULT_OLLAMA_URL;
	const ollamaModel = env.OLLAMA_MODEL?.trim() || config.ollama?.model || DEFAULT_OLLAMA_MODEL;

	return {
		allowedUsers: [...new Set(allowedUsers)],
		rateLimit: { maxRequests, windowMs },
		maxPromptLength,
		polling: {
			timeoutSeconds: telegram?.polling?.timeoutSeconds ?? 30,
			fetchTimeoutMs: telegram?.polling?.fetchTimeoutMs ?? 40_000,
			retryDelayMs: telegram?.polling?.retryDelayMs ?? 5_000,
		},
		sendTimeoutMs: telegram?.sendTimeoutMs ?? 10_000,
		chunkSize: telegram?.chunkSize ?? 4000,
		chunkDelayMs: telegram?.chunkDelayMs ?? 100,
		ipFamily: telegram?.ipFamily ?? 4,
		ollama: {
			url: ollamaUrl.replace(/\/+$/, ""),
			model: ollamaModel,
			timeoutMs: (config.ollama?.timeoutSeconds ?? 480) * 1000,
		},
	};
}
