/**
 * alias-tls inspect <path> [--kind identity|trust] [--password <password>]
 */

import chalk from "chalk";
import { type Command, Option } from "commander";

import { DEFAULT_STORE_PASSWORD } from "../client/defaults.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { listStore } from "../keystore/listing.js";
import { StoreKindSchema } from "../keystore/pkcs12.js";
import { getChildLogger } from "../logging.js";
import { resolveUserPath } from "../utils.js";

export const STORE_PASSWORD_ENV = "ALIAS_TLS_STORE_PASSWORD";

/**
 * --password wins over the environment; the built-in client default comes last.
 */
export function resolveStorePassword(
	flag: string | undefined,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return flag ?? env[STORE_PASSWORD_ENV] ?? DEFAULT_STORE_PASSWORD;
}

export function registerInspectCommand(program: Command): void {
	program
		.command("inspect")
		.description("List the entries of a PKCS#12 identity or trust store")
		.helpOption("--help", "Show help")
		.argument("<path>", "Store file (.p12/.pfx)")
		.addOption(new Option("--kind <kind>", "Store kind").choices(StoreKindSchema.options).default("identity"))
		.addOption(
			new Option("--password <password>", `Store password (default: $${STORE_PASSWORD_ENV}, then built-in)`),
		)
		.action(async (storePath: string, opts: { kind: string; password?: string }) => {
			const logger = getChildLogger({ module: "cmd-inspect" });
			const target = resolveUserPath(storePath);
			try {
				const kind = StoreKindSchema.parse(opts.kind);
				const rows = await listStore(target, resolveStorePassword(opts.password), kind);
				if (rows.length === 0) {
					console.log(chalk.gray("(empty)"));
					return;
				}
				for (const row of rows) {
					console.log(chalk.bold(row.alias));
					console.log(`  key type:    ${row.keyType ?? "unknown"}`);
					console.log(`  subject:     ${row.subject.replaceAll("\n", ", ")}`);
					console.log(`  issuer:      ${row.issuer.replaceAll("\n", ", ")}`);
					console.log(`  valid to:    ${row.validTo}`);
					console.log(`  sha256:      ${row.fingerprint256}`);
					if (row.chainLength > 1) {
						console.log(`  chain:       ${row.chainLength} certificates`);
					}
				}
			} catch (err) {
				logger.warn({ storePath: target, error: formatErrorSafe(err) }, "inspect failed");
				console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
				process.exitCode = 1;
			}
		});
}
