import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg: unknown = require("../../package.json");
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
		return "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	// Long forms only: single-hyphen client flags (-host, -ks, -alias...) pass through untouched
	program
		.name("alias-tls")
		.description("TLS test client with selectable client identity")
		.version(getVersion(), "--version", "Print the version")
		.helpOption("--help", "Show help")
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
