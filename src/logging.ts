import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type AliasTlsConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_FILE = path.join(CONFIG_DIR, "logs", "alias-tls.log");

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

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
let overrideSettings: LoggerSettings | null = null;

function isLevel(candidate: string): candidate is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === candidate);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const cfg: AliasTlsConfig["logging"] | undefined = overrideSettings ?? loadConfig().logging;
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? DEFAULT_LOG_FILE;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	// Sync destination: every line is already on disk, end() releases the fd
	dest.end();
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	fs.mkdirSync(path.dirname(settings.file), { recursive: true, mode: 0o700 });
	const destination = pino.destination({ dest: settings.file, sync: true });
	// Lines name hosts and store paths
	fs.chmodSync(settings.file, 0o600);

	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: ["password", "*.password", "privateKey", "*.privateKey"],
				censor: "[redacted]",
			},
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
