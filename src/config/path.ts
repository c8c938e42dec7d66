import path from "node:path";

import { CONFIG_DIR } from "../utils.js";

export const CONFIG_ENV = "ALIAS_TLS_CONFIG";

let configPathOverride: string | null = null;

/**
 * `--config` wins, then $ALIAS_TLS_CONFIG, then ~/.alias-tls/config.json.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	return configPathOverride ?? (env[CONFIG_ENV] || path.join(CONFIG_DIR, "config.json"));
}

/** Pass null to drop the override. */
export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}
