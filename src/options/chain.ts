/**
 * Ordered option chain.
 *
 * Layers are tried most specific first; the first one that consumes the
 * argument wins. The last layer is the most general and has nothing to defer to.
 */

import { ConfigParseError } from "../errors.js";
import { normalizeFlag } from "./layers.js";
import type {
	ClientConfiguration,
	ConfigurationDraft,
	FlagSpec,
	OptionLayer,
} from "./types.js";

export type ParseOutcome =
	| { ok: true; config: ClientConfiguration }
	| { ok: false; error: ConfigParseError };

export class OptionChain {
	constructor(private readonly layers: readonly OptionLayer[]) {}

	/**
	 * Offer the option at `cursor` to each layer in turn.
	 * @returns arguments consumed, 0 when no layer accepted it
	 */
	handle(args: readonly string[], cursor: number, draft: ConfigurationDraft): number {
		for (const layer of this.layers) {
			const consumed = layer.handle(args, cursor, draft);
			if (consumed > 0) return consumed;
		}
		return 0;
	}

	findFlag(token: string): FlagSpec | undefined {
		const flag = normalizeFlag(token);
		for (const layer of this.layers) {
			const flagSpec = layer.flags.find((f) => f.flag === flag);
			if (flagSpec) return flagSpec;
		}
		return undefined;
	}

	/**
	 * Usage text, general options first, the way each layer appends its own.
	 */
	usage(defaults: ClientConfiguration): string {
		const flagSpecs = [...this.layers].reverse().flatMap((layer) => layer.flags);
		const width = Math.max(...flagSpecs.map((s) => `${s.flag} ${s.placeholder}`.length));
		const lines = flagSpecs.map(
			(s) => `  ${`${s.flag} ${s.placeholder}`.padEnd(width)}  ${s.describe(defaults)}`,
		);
		return ["Options:", ...lines].join("\n");
	}
}

export function createDraft(defaults: ClientConfiguration): ConfigurationDraft {
	return {
		host: defaults.host,
		port: defaults.port,
		identityStore: { ...defaults.identityStore },
		trustStore: { ...defaults.trustStore },
		...(defaults.alias !== undefined ? { alias: defaults.alias } : {}),
	};
}

export function freezeConfiguration(draft: ConfigurationDraft): ClientConfiguration {
	return Object.freeze({
		host: draft.host,
		port: draft.port,
		identityStore: Object.freeze({ ...draft.identityStore }),
		trustStore: Object.freeze({ ...draft.trustStore }),
		...(draft.alias !== undefined ? { alias: draft.alias } : {}),
	});
}

/**
 * Feed arguments to the chain until one is refused or the list runs out.
 * @returns the cursor position where scanning stopped
 */
export function scanArguments(
	args: readonly string[],
	chain: OptionChain,
	draft: ConfigurationDraft,
): number {
	let cursor = 0;
	while (cursor < args.length) {
		const consumed = chain.handle(args, cursor, draft);
		if (consumed === 0) break;
		cursor += consumed;
	}
	return cursor;
}

function describeFailure(
	args: readonly string[],
	cursor: number,
	chain: OptionChain,
): ConfigParseError {
	const token = args[cursor];
	const flagSpec = token === undefined ? undefined : chain.findFlag(token);

	if (!flagSpec) {
		return new ConfigParseError(`Unrecognized option '${token}'`, "unrecognized", cursor, token);
	}
	const value = args[cursor + 1];
	if (value === undefined) {
		return new ConfigParseError(
			`Option ${flagSpec.flag} requires a value ${flagSpec.placeholder}`,
			"missing-value",
			cursor,
			token,
		);
	}
	return new ConfigParseError(
		`Invalid value '${value}' for option ${flagSpec.flag}`,
		"invalid-value",
		cursor,
		token,
	);
}

/**
 * Resolve command-line arguments into a configuration.
 * Any refused argument fails the whole parse; no partial configuration escapes.
 */
export function parseArguments(
	args: readonly string[],
	chain: OptionChain,
	defaults: ClientConfiguration,
): ParseOutcome {
	const draft = createDraft(defaults);
	const cursor = scanArguments(args, chain, draft);

	if (cursor < args.length) {
		return { ok: false, error: describeFailure(args, cursor, chain) };
	}
	return { ok: true, config: freezeConfiguration(draft) };
}
