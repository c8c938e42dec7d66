/**
 * Default command: run the client against a TLS server.
 *
 * Everything after the command name is handed to the profile's option chain,
 * so the usual invocation is just
 *   alias-tls -host server.example -port 8443 -alias clientA < input.txt
 */

import chalk from "chalk";
import { type Command, Option } from "commander";

import { resolveClientDefaults } from "../client/defaults.js";
import { PROFILE_NAMES, getProfile, isProfileName } from "../client/profiles.js";
import { type RunOutcome, type RunReporter, runClient } from "../client/run.js";
import { getTlsConfig, loadConfig } from "../config/config.js";

export const consoleReporter: RunReporter = {
	info: (message) => console.log(message),
	error: (message) => console.error(chalk.red(message)),
};

export function exitCodeFor(outcome: RunOutcome): number {
	switch (outcome.state) {
		case "usage-displayed":
			return 2;
		case "failed":
			return 1;
		case "closed":
			return outcome.error ? 1 : 0;
	}
}

export function registerConnectCommand(program: Command): void {
	program
		.command("connect", { isDefault: true })
		.description("Connect to a TLS server and send standard input line by line")
		.helpOption("--help", "Show help")
		.addOption(
			new Option("--profile <name>", "Client profile").choices(PROFILE_NAMES).default("select-alias"),
		)
		.argument("[options...]", "Client flags: -host -port -ks -kspass -ts -tspass -alias")
		.allowUnknownOption()
		.action(async (args: string[], opts: { profile: string }) => {
			if (!isProfileName(opts.profile)) {
				console.error(chalk.red(`Unknown profile '${opts.profile}'`));
				process.exitCode = 2;
				return;
			}

			const config = loadConfig();
			const controller = new AbortController();
			const onSigint = () => controller.abort();
			process.once("SIGINT", onSigint);

			try {
				const outcome = await runClient({
					profile: getProfile(opts.profile),
					args,
					defaults: resolveClientDefaults(config.client),
					tls: getTlsConfig(config),
					input: process.stdin,
					reporter: consoleReporter,
					signal: controller.signal,
				});
				if (outcome.state === "closed" && !outcome.error) {
					console.log(chalk.gray(`Sent ${outcome.linesSent} line(s); connection closed.`));
				}
				process.exitCode = exitCodeFor(outcome);
			} finally {
				process.removeListener("SIGINT", onSigint);
			}
		});
}
