import os from "node:os";
import path from "node:path";

/**
 * Parse a Telegram user/chat identifier given as a number, a numeric string,
 * or a "tg:"-prefixed string. Returns null for anything that is not an integer.
 */
export function parseTelegramId(id: string | number): number | null {
	if (typeof id === "number") {
		return Number.isSafeInteger(id) ? id : null;
	}
	const withoutPrefix = id.trim().replace(/^tg:/, "");
	// Optional leading minus for group chat IDs
	if (!/^-?\d+$/.test(withoutPrefix)) {
		return null;
	}
	const parsed = Number.parseInt(withoutPrefix, 10);
	return Number.isSafeInteger(parsed) ? parsed : null;
}

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep with optional abort signal. Rejects with "Aborted" when the signal fires.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new Error("Aborted"));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new Error("Aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export const CONFIG_DIR = process.env.OLLAMA_RELAY_DATA_DIR || path.join(os.homedir(), ".ollama-relay");
