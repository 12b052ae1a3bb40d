import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_DIR = path.join(CONFIG_DIR, "logs");
export const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "ollama-relay.log");

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

type Destination = ReturnType<typeof pino.destination>;

let rootLogger: Logger | null = null;
let activeSettings: ResolvedSettings | null = null;
let destination: Destination | null = null;
let overrideSettings: LoggerSettings | null = null;
const childLoggers = new Set<Logger>();

// Module loggers are created at import, before --verbose or --config are
// applied. They all write through this stream, so swapping the file
// underneath never leaves a child holding a closed destination.
const forwardingStream: DestinationStream = {
	write(line: string) {
		destination?.write(line);
	},
};

function isLevel(value: string): value is LevelWithSilent {
	return (ALLOWED_LEVELS as readonly string[]).includes(value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function readLoggingConfig(): LoggingConfig | undefined {
	if (overrideSettings) return overrideSettings;
	try {
		return loadConfig().logging;
	} catch {
		// An unreadable config is reported by the command that loads it;
		// logging falls back to defaults so that report can be written.
		return undefined;
	}
}

function resolveSettings(): ResolvedSettings {
	const cfg = readLoggingConfig();
	return {
		level: normalizeLevel(cfg?.level),
		file: cfg?.file ?? DEFAULT_LOG_FILE,
	};
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch {
		// nothing buffered, or the stream is already closed
	}
	dest.end();
}

function openDestination(file: string): Destination {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });

	// Log lines carry chat IDs and prompts; keep the file owner-only.
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
	}

	return pino.destination({ dest: file, mkdir: true, sync: true });
}

function applySettings(logger: Logger, settings: ResolvedSettings): void {
	if (!destination || activeSettings?.file !== settings.file) {
		const previous = destination;
		destination = openDestination(settings.file);
		if (previous) closeDestination(previous);
	}
	if (activeSettings?.level !== settings.level) {
		logger.level = settings.level;
		for (const child of childLoggers) {
			child.level = settings.level;
		}
	}
	activeSettings = settings;
}

/**
 * The process-wide logger. Re-reads the logging settings on every call and
 * applies a changed level or file in place.
 */
export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!rootLogger) {
		rootLogger = pino(
			{
				level: settings.level,
				base: undefined,
				timestamp: pino.stdTimeFunctions.isoTime,
			},
			forwardingStream,
		);
	}
	const changed =
		!activeSettings ||
		activeSettings.level !== settings.level ||
		activeSettings.file !== settings.file;
	if (!destination || changed) {
		applySettings(rootLogger, settings);
	}
	return rootLogger;
}

export function getChildLogger(bindings?: Bindings): Logger {
	const child = getLogger().child(bindings ?? {});
	childLoggers.add(child);
	return child;
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
}

/** Flush and close the log file. A later getLogger() reopens it. */
export function closeLogger(): void {
	if (destination) {
		closeDestination(destination);
		destination = null;
	}
}
