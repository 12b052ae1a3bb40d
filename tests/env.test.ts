import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { resetConfigCache } from "../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../src/config/path.js";
import { readEnv, resetEnvCache } from "../src/env.js";
import type { RuntimeEnv } from "../src/runtime.js";

function createRuntime() {
	const errors: string[] = [];
	const runtime: RuntimeEnv = {
		log: vi.fn(),
		error: (message) => {
			errors.push(message);
		},
		exit: (code) => {
			throw new Error(`exit ${code}`);
		},
	};
	return { runtime, errors };
}

describe("readEnv", () => {
	let tmpDir: string;
	let configPath: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-env-"));
		configPath = path.join(tmpDir, "ollama-relay.json");
		setConfigPath(configPath);
		resetConfigCache();
		resetEnvCache();
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		resetConfigPath();
		resetConfigCache();
		resetEnvCache();
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("prefers the token from the config file", () => {
		fs.writeFileSync(configPath, JSON.stringify({ telegram: { botToken: "test-secret-config" } }));
		vi.stubEnv("TELEGRAM_BOT_TOKEN", "test-secret-env");

		expect(readEnv(createRuntime().runtime)).toEqual({ telegramBotToken: "test-secret-config" });
	});

	it("falls back to TELEGRAM_BOT_TOKEN", () => {
		vi.stubEnv("TELEGRAM_BOT_TOKEN", " test-secret-env ");

		expect(readEnv(createRuntime().runtime)).toEqual({ telegramBotToken: "test-secret-env" });
	});

	it("exits when no token is available", () => {
		vi.stubEnv("TELEGRAM_BOT_TOKEN", "");
		const { runtime, errors } = createRuntime();

		expect(() => readEnv(runtime)).toThrow("exit 1");
		expect(errors[0]).toBe("Telegram bot token not found.");
	});
});
