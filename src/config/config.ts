import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { isErrnoException } from "../utils.js";
import { resolveConfigPath } from "./path.js";

// Store location + password pair used for both identity and trust stores
const StoreLocationSchema = z.object({
	path: z.string().min(1).optional(),
	password: z.string().optional(),
});

// Defaults for the client flags; command-line values still win
const ClientDefaultsSchema = z.object({
	host: z.string().min(1).optional(),
	port: z.number().int().min(1).max(65535).optional(),
	identityStore: StoreLocationSchema.optional(),
	trustStore: StoreLocationSchema.optional(),
	alias: z.string().min(1).optional(),
});

const KeyTypeSchema = z.enum(["RSA", "EC", "Ed25519", "Ed448"]);

// TLS engine knobs handed to node:tls
const TlsConfigSchema = z.object({
	// Order matters: client identity selection walks these front to back
	keyTypes: z.array(KeyTypeSchema).min(1).default(["RSA", "EC"]),
	minVersion: z.enum(["TLSv1.2", "TLSv1.3"]).optional(),
	// Acceptable issuer DNs for client identity selection (node X509Certificate.issuer format)
	issuers: z.array(z.string().min(1)).optional(),
});

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Main config schema
const AliasTlsConfigSchema = z.object({
	client: ClientDefaultsSchema.optional(),
	tls: TlsConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type AliasTlsConfig = z.infer<typeof AliasTlsConfigSchema>;
export type ClientDefaultsConfig = z.infer<typeof ClientDefaultsSchema>;
export type TlsConfig = z.infer<typeof TlsConfigSchema>;

let cachedConfig: AliasTlsConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): AliasTlsConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const parsed: unknown = JSON5.parse(raw);
		const validated = AliasTlsConfigSchema.parse(parsed);

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = isErrnoException(err) ? err.code : undefined;
		if (code === "ENOENT" || code === "EACCES") {
			// No readable config file - use defaults
			return {};
		}
		throw err;
	}
}

/**
 * Resolved TLS settings with schema defaults applied even when the section is absent.
 */
export function getTlsConfig(config: AliasTlsConfig = loadConfig()): TlsConfig {
	return TlsConfigSchema.parse(config.tls ?? {});
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
