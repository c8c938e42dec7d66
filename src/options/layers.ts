import type { ConfigurationDraft, FlagSpec, OptionLayer } from "./types.js";

const PORT_PATTERN = /^\+?\d{1,5}$/;

export function normalizeFlag(token: string): string {
	return token.trim().toLowerCase();
}

/**
 * Build a layer from a flag table. Every flag takes exactly one value.
 */
export function defineLayer(name: string, flags: readonly FlagSpec[]): OptionLayer {
	return {
		name,
		flags,
		handle(args: readonly string[], cursor: number, draft: ConfigurationDraft): number {
			const token = args[cursor];
			if (token === undefined) return 0;

			const flagSpec = flags.find((f) => f.flag === normalizeFlag(token));
			if (!flagSpec) return 0;

			const value = args[cursor + 1];
			if (value === undefined) return 0;

			return flagSpec.apply(value, draft) ? 2 : 0;
		},
	};
}

export function parsePort(value: string): number | null {
	if (!PORT_PATTERN.test(value)) return null;
	const port = Number.parseInt(value, 10);
	return port >= 1 && port <= 65535 ? port : null;
}

export const connectionLayer = defineLayer("connection", [
	{
		flag: "-host",
		placeholder: "<name>",
		describe: (d) => `host of server (default '${d.host}')`,
		apply(value, draft) {
			if (!value.trim()) return false;
			draft.host = value;
			return true;
		},
	},
	{
		flag: "-port",
		placeholder: "<int>",
		describe: (d) => `port of server (default ${d.port})`,
		apply(value, draft) {
			const port = parsePort(value);
			if (port === null) return false;
			draft.port = port;
			return true;
		},
	},
]);

export const identityStoreLayer = defineLayer("identity-store", [
	{
		flag: "-ks",
		placeholder: "<path>",
		describe: (d) => `identity store (default '${d.identityStore.path}')`,
		apply(value, draft) {
			draft.identityStore.path = value;
			return true;
		},
	},
	{
		flag: "-kspass",
		placeholder: "<pw>",
		describe: () => "identity store password (default: built-in)",
		apply(value, draft) {
			draft.identityStore.password = value;
			return true;
		},
	},
]);

export const trustStoreLayer = defineLayer("trust-store", [
	{
		flag: "-ts",
		placeholder: "<path>",
		describe: (d) => `trust store (default '${d.trustStore.path}')`,
		apply(value, draft) {
			draft.trustStore.path = value;
			return true;
		},
	},
	{
		flag: "-tspass",
		placeholder: "<pw>",
		describe: () => "trust store password (default: built-in)",
		apply(value, draft) {
			draft.trustStore.password = value;
			return true;
		},
	},
]);

export const aliasLayer = defineLayer("alias", [
	{
		flag: "-alias",
		placeholder: "<name>",
		describe: (d) => (d.alias ? `alias to use (default '${d.alias}')` : "alias to use"),
		apply(value, draft) {
			if (!value) return false;
			draft.alias = value;
			return true;
		},
	},
]);
