import { z } from "zod";
import { getConfigPath, loadConfig } from "./config/config.js";
import { defaultRuntime, type RuntimeEnv } from "./runtime.js";

const RelayEnvSchema = z.object({
	telegramBotToken: z.string().min(1),
});

export type RelayEnv = z.infer<typeof RelayEnvSchema>;

let cachedEnv: RelayEnv | null = null;

/**
 * Read and validate the bot token.
 *
 * The config file (telegram.botToken) wins over TELEGRAM_BOT_TOKEN; the env var
 * is the fallback for container deployments. A missing token is fatal.
 */
export function readEnv(runtime: RuntimeEnv = defaultRuntime): RelayEnv {
	if (cachedEnv) return cachedEnv;

	let token: string | undefined;
	let configError: string | undefined;
	try {
		token = loadConfig().telegram?.botToken;
	} catch (err) {
		configError = err instanceof Error ? err.message : String(err);
	}

	if (!token) {
		token = process.env.TELEGRAM_BOT_TOKEN;
	}

	if (token && configError) {
		runtime.error(`Warning: Config file failed to load (${configError}), using TELEGRAM_BOT_TOKEN`);
	}

	const result = RelayEnvSchema.safeParse({ telegramBotToken: token?.trim() ?? "" });
	if (!result.success) {
		runtime.error("Telegram bot token not found.");
		if (configError) {
			runtime.error(`  (config file error: ${configError})`);
		}
		runtime.error("");
		runtime.error("Option 1 - Config file:");
		runtime.error(`  Add to ${getConfigPath()}:`);
		runtime.error('  { "telegram": { "botToken": "your-token-here" } }');
		runtime.error("");
		runtime.error("Option 2 - Environment variable:");
		runtime.error("  export TELEGRAM_BOT_TOKEN=your-token-here");
		return runtime.exit(1);
	}

	cachedEnv = result.data;
	return cachedEnv;
}

/**
 * Reset cached environment (for testing).
 */
export function resetEnvCache() {
	cachedEnv = null;
}
