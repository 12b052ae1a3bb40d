/**
 * Process-level unhandled rejection handler.
 *
 * - config / fatal errors: exit(1)
 * - transient network errors: warn and keep running
 * - AbortError: expected during shutdown, debug only
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

// A rejected bot token (401) or an unparsable config file will not fix itself
const CONFIG_PATTERNS = ["unauthorized", "bot token", "json5:", "cannot find module"];

const FATAL_PATTERNS = ["out of memory", "assertion", "invariant", "maximum call stack"];

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";

	const lower = formatErrorSafe(err, 1000).toLowerCase();
	if (CONFIG_PATTERNS.some((pattern) => lower.includes(pattern))) return "config";
	if (FATAL_PATTERNS.some((pattern) => lower.includes(pattern))) return "fatal";
	return "unknown";
}

/**
 * Install the handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;
			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;
			case "config":
			case "fatal":
				logger.fatal({ process: processLabel, category }, `unhandled rejection (exiting): ${formatted}`);
				process.exit(1);
				break;
			default:
				// Unknown rejections are logged, not fatal: the intake loop owns its own errors.
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
