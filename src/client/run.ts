/**
 * One client run: parse arguments, connect, stream input, close.
 *
 * idle → parsing-args → usage-displayed
 *                     → connecting → connected → transmitting → closed
 *                       (connecting | transmitting) → failed
 */

import type { TlsConfig } from "../config/config.js";
import {
	ConfigParseError,
	CredentialLoadError,
	HandshakeError,
	TransmissionIOError,
	TrustLoadError,
} from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { parseArguments } from "../options/chain.js";
import type { ClientConfiguration } from "../options/types.js";
import { type Connector, TlsSession, defaultConnector } from "../tls/session.js";
import { transmit } from "../tls/transmit.js";
import type { ClientProfile } from "./profiles.js";

export type RunState =
	| "idle"
	| "parsing-args"
	| "usage-displayed"
	| "connecting"
	| "connected"
	| "transmitting"
	| "closed"
	| "failed";

export type RunOutcome =
	| { state: "usage-displayed"; error: ConfigParseError }
	| { state: "failed"; error: Error }
	| {
			state: "closed";
			clientAlias: string | null;
			linesSent: number;
			error: TransmissionIOError | null;
	  };

export type RunReporter = {
	info(message: string): void;
	error(message: string): void;
};

export type RunOptions = {
	profile: ClientProfile;
	args: readonly string[];
	defaults: ClientConfiguration;
	tls: TlsConfig;
	input: NodeJS.ReadableStream;
	reporter: RunReporter;
	connector?: Connector;
	/** Interrupt: closes the session, whatever step the run is in. */
	signal?: AbortSignal;
	onStateChange?: (state: RunState) => void;
};

function describeFailure(err: unknown): string {
	if (
		err instanceof CredentialLoadError ||
		err instanceof TrustLoadError ||
		err instanceof HandshakeError
	) {
		return err.message;
	}
	return formatErrorSafe(err);
}

export async function runClient(options: RunOptions): Promise<RunOutcome> {
	const logger = getChildLogger({ module: "client-run", profile: options.profile.name });
	const { profile, reporter } = options;
	let state: RunState = "idle";
	const enter = (next: RunState) => {
		logger.debug({ from: state, to: next }, "run state");
		state = next;
		options.onStateChange?.(next);
	};

	enter("parsing-args");
	const parsed = parseArguments(options.args, profile.chain, options.defaults);
	if (!parsed.ok) {
		enter("usage-displayed");
		reporter.error(parsed.error.message);
		reporter.info(profile.chain.usage(options.defaults));
		return { state: "usage-displayed", error: parsed.error };
	}

	const config = parsed.config;
	enter("connecting");
	const session = new TlsSession(
		{ host: config.host, port: config.port },
		options.connector ?? defaultConnector,
	);
	const onAbort = () => session.close();
	options.signal?.addEventListener("abort", onAbort, { once: true });

	try {
		let clientAlias: string | null;
		try {
			const context = await profile.buildContext(config, options.tls);
			clientAlias = context.clientAlias;
			if (options.signal?.aborted) {
				throw new HandshakeError("Interrupted before connecting", config.host, config.port);
			}
			await session.connect(context.material);
		} catch (err) {
			session.close();
			enter("failed");
			logger.warn({ error: formatErrorSafe(err) }, "connection failed");
			reporter.error(`Connection failed: ${describeFailure(err)}`);
			return { state: "failed", error: err instanceof Error ? err : new Error(String(err)) };
		}

		enter("connected");
		logger.info(
			{ host: config.host, port: config.port, clientAlias, ...(session.details ?? {}) },
			"connected",
		);
		reporter.info(
			clientAlias
				? `Connected to ${config.host}:${config.port} as '${clientAlias}', now you can type input:`
				: `Connected to ${config.host}:${config.port}, now you can type input:`,
		);

		enter("transmitting");
		const result = await transmit(
			options.input,
			session,
			options.signal ? { signal: options.signal } : {},
		);
		if (result.error) {
			reporter.error(`Error: ${result.error.message}`);
		}
		enter("closed");
		return { state: "closed", clientAlias, linesSent: result.linesSent, error: result.error };
	} finally {
		options.signal?.removeEventListener("abort", onAbort);
		session.close();
	}
}
