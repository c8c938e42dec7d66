/**
 * Error taxonomy for a client run.
 *
 * Each failure mode the operator can hit has its own class so the run loop can
 * decide locally whether to show usage, abort, or end normally.
 */

export type ParseFailureReason = "unrecognized" | "missing-value" | "invalid-value";

/**
 * Command-line arguments could not be turned into a configuration.
 * Recovered by printing usage; no connection is attempted.
 */
export class ConfigParseError extends Error {
	constructor(
		message: string,
		public readonly reason: ParseFailureReason,
		public readonly index: number,
		public readonly token: string | undefined,
	) {
		super(message);
		this.name = "ConfigParseError";
	}
}

export type StoreLoadCode = "NOT_FOUND" | "UNREADABLE" | "MALFORMED" | "BAD_PASSWORD" | "WRONG_KIND";

/**
 * The identity store could not be opened or decoded.
 */
export class CredentialLoadError extends Error {
	constructor(
		message: string,
		public readonly code: StoreLoadCode,
		public readonly storePath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "CredentialLoadError";
	}
}

/**
 * The trust store could not be opened or decoded.
 */
export class TrustLoadError extends Error {
	constructor(
		message: string,
		public readonly code: StoreLoadCode,
		public readonly storePath: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "TrustLoadError";
	}
}

/**
 * The TLS handshake did not complete. The socket is already closed when this
 * is thrown.
 */
export class HandshakeError extends Error {
	constructor(
		message: string,
		public readonly host: string,
		public readonly port: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "HandshakeError";
	}
}

/**
 * Reading local input or writing to the session failed after the handshake.
 */
export class TransmissionIOError extends Error {
	constructor(
		message: string,
		public readonly direction: "read" | "write",
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "TransmissionIOError";
	}
}
