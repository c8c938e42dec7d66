import chalk from "chalk";
import type { Command } from "commander";

import { resolveClientDefaults } from "../client/defaults.js";
import { getTlsConfig, loadConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { loadIdentityStore } from "../keystore/identity-store.js";
import type { Principal, X509KeyManager } from "../tls/key-manager.js";
import { resolveUserPath } from "../utils.js";
import { resolveStorePassword } from "./inspect.js";

export type AliasRow = {
	keyType: string;
	aliases: string[];
};

/**
 * Valid client aliases per key type, in the order the client would try them.
 */
export function collectAliasRows(
	keyManager: X509KeyManager,
	keyTypes: readonly string[],
	issuers: readonly Principal[] | null,
): AliasRow[] {
	return keyTypes.map((keyType) => ({
		keyType,
		aliases: keyManager.getClientAliases(keyType, issuers) ?? [],
	}));
}

export function registerAliasesCommand(program: Command): void {
	program
		.command("aliases")
		.description("Show which client aliases an identity store offers per key type")
		.helpOption("--help", "Show help")
		.argument("[path]", "Identity store file (default: configured identity store)")
		.option("--password <password>", "Store password")
		.action(async (storePath: string | undefined, opts: { password?: string }) => {
			const config = loadConfig();
			const defaults = resolveClientDefaults(config.client);
			const tls = getTlsConfig(config);
			const target = storePath ? resolveUserPath(storePath) : defaults.identityStore.path;
			const password = storePath
				? resolveStorePassword(opts.password)
				: (opts.password ?? defaults.identityStore.password);

			try {
				const keyManager = await loadIdentityStore(target, password);
				const issuers = tls.issuers ?? null;
				for (const row of collectAliasRows(keyManager, tls.keyTypes, issuers)) {
					const list = row.aliases.length > 0 ? row.aliases.join(", ") : chalk.gray("(none)");
					console.log(`${chalk.bold(row.keyType.padEnd(8))} ${list}`);
				}
				const chosen = keyManager.chooseClientAlias(tls.keyTypes, issuers);
				console.log(`Default selection: ${chosen ?? chalk.gray("(none)")}`);
			} catch (err) {
				console.error(chalk.red(`Error: ${formatErrorSafe(err)}`));
				process.exitCode = 1;
			}
		});
}
