/**
 * Option chain types.
 *
 * A layer owns a handful of single-hyphen flags and reports how many
 * arguments it consumed at a cursor position; zero means "not mine / malformed".
 */

export type StoreLocation = {
	path: string;
	password: string;
};

/**
 * Resolved settings for one client run. Frozen once parsing completes.
 */
export interface ClientConfiguration {
	readonly host: string;
	readonly port: number;
	readonly identityStore: Readonly<StoreLocation>;
	readonly trustStore: Readonly<StoreLocation>;
	readonly alias?: string;
}

/**
 * Mutable draft the layers write into while the arguments are scanned.
 */
export type ConfigurationDraft = {
	host: string;
	port: number;
	identityStore: StoreLocation;
	trustStore: StoreLocation;
	alias?: string;
};

export interface FlagSpec {
	/** Lower-case flag including its hyphen, e.g. `-kspass`. */
	readonly flag: string;
	readonly placeholder: string;
	describe(defaults: ClientConfiguration): string;
	/** Apply the value to the draft. Returns false (leaving the draft untouched) when the value is unusable. */
	apply(value: string, draft: ConfigurationDraft): boolean;
}

export interface OptionLayer {
	readonly name: string;
	readonly flags: readonly FlagSpec[];
	/**
	 * Try to interpret the option at `cursor`.
	 * @returns arguments consumed (≥1), or 0 when unrecognized or malformed
	 */
	handle(args: readonly string[], cursor: number, draft: ConfigurationDraft): number;
}
