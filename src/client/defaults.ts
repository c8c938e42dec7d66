import path from "node:path";

import type { ClientDefaultsConfig } from "../config/config.js";
import type { ClientConfiguration } from "../options/types.js";
import { CONFIG_DIR, resolveUserPath } from "../utils.js";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 8087;
export const DEFAULT_KEY_DIR = path.join(CONFIG_DIR, "keys");
export const DEFAULT_IDENTITY_STORE = path.join(DEFAULT_KEY_DIR, "clientKeys.p12");
export const DEFAULT_TRUST_STORE = path.join(DEFAULT_KEY_DIR, "clientTrust.p12");
export const DEFAULT_STORE_PASSWORD = "password";

/**
 * Built-in defaults, overlaid with the config file's `client` section.
 * Each call returns a fresh value.
 */
export function resolveClientDefaults(overrides: ClientDefaultsConfig = {}): ClientConfiguration {
	return {
		host: overrides.host ?? DEFAULT_HOST,
		port: overrides.port ?? DEFAULT_PORT,
		identityStore: {
			path: resolveUserPath(overrides.identityStore?.path ?? DEFAULT_IDENTITY_STORE),
			password: overrides.identityStore?.password ?? DEFAULT_STORE_PASSWORD,
		},
		trustStore: {
			path: resolveUserPath(overrides.trustStore?.path ?? DEFAULT_TRUST_STORE),
			password: overrides.trustStore?.password ?? DEFAULT_STORE_PASSWORD,
		},
		...(overrides.alias !== undefined ? { alias: overrides.alias } : {}),
	};
}
