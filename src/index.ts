#!/usr/bin/env node

import chalk from "chalk";

import { createProgram } from "./cli/program.js";
import { registerAliasesCommand } from "./commands/aliases.js";
import { registerConnectCommand } from "./commands/connect.js";
import { registerInspectCommand } from "./commands/inspect.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { installUnhandledRejectionHandler } from "./infra/unhandled-rejections.js";
import { closeLogger, getLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerConnectCommand(program);
registerInspectCommand(program);
registerAliasesCommand(program);

// Global options must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
	installUnhandledRejectionHandler((message) => console.error(chalk.red(message)));
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination keeps a handle open
		closeLogger();
	});
