/**
 * Error classification for the Bot API and Ollama connections.
 *
 * Walks error cause chains to tell transient network failures and aborts
 * apart from everything else.
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

/** Error messages (substrings) that indicate a transient network issue. */
const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"network error",
	"network request for",
	"socket hang up",
	"other side closed",
	"ECONNRESET",
	"ETIMEDOUT",
	"ECONNREFUSED",
	"client network socket disconnected",
	"timed out after",
];

// Bot API URLs embed the token as /bot<id>:<secret>/
const BOT_TOKEN_PATTERN = /bot\d+:[A-Za-z0-9_-]+/g;

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.error`, `.errors`.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		// grammy's HttpError keeps the underlying fetch failure in `.error`
		for (const key of ["cause", "reason", "error"] as const) {
			const next = Reflect.get(val, key);
			if (next != null) {
				queue.push({ value: next, depth: nextDepth });
			}
		}
		const nested = Reflect.get(val, "errors");
		if (Array.isArray(nested)) {
			for (const e of nested) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * Check if an error (or any error in its cause chain) is a transient network error.
 * TimeoutError counts as transient.
 */
export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			const code = Reflect.get(candidate, "code");
			if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) {
				return true;
			}
			if (Reflect.get(candidate, "name") === "TimeoutError") {
				return true;
			}
		}

		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}

	return false;
}

/**
 * Check if an error is an AbortError (expected during shutdown / cancellation).
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if (Reflect.get(candidate, "name") === "AbortError") return true;
			if (Reflect.get(candidate, "code") === "ABORT_ERR") return true;
		}

		const message = extractMessage(candidate);
		if (message) {
			const lower = message.toLowerCase();
			if (
				lower.includes("this operation was aborted") ||
				lower.includes("the operation was aborted") ||
				lower.includes("signal is aborted")
			) {
				return true;
			}
		}
	}

	return false;
}

/**
 * Format an error to a single string with URLs and bot tokens redacted.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redact(msg), maxLength);
		}
		return truncate(redact(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (val instanceof Error) return val.message;
	if (typeof val === "object" && val !== null) {
		const msg = Reflect.get(val, "message");
		if (typeof msg === "string") return msg;
	}
	return null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern.toLowerCase()));
}

function redact(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]").replace(BOT_TOKEN_PATTERN, "bot[REDACTED]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
