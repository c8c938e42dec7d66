/**
 * One TLS connection for one client run.
 *
 * States: unconnected → connected → handshake-complete → closed, or failed
 * from any non-terminal state. The session owns its socket on every path.
 */

import { isIP } from "node:net";
import { type ConnectionOptions, connect as tlsConnect } from "node:tls";

import { HandshakeError, TransmissionIOError } from "../errors.js";
import { describeConnectFailure, formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { ContextMaterial } from "./context.js";

export type SessionState = "unconnected" | "connected" | "handshake-complete" | "closed" | "failed";

/**
 * The slice of tls.TLSSocket the session drives.
 */
export interface SecureSocket {
	readonly destroyed: boolean;
	once(event: "connect" | "secureConnect", listener: () => void): unknown;
	once(event: "close", listener: (hadError: boolean) => void): unknown;
	once(event: "error", listener: (err: Error) => void): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
	removeListener(event: "secureConnect" | "error" | "close", listener: (...args: never[]) => void): unknown;
	write(data: Uint8Array, callback: (err?: Error | null) => void): boolean;
	end(callback?: () => void): unknown;
	destroy(): unknown;
	getProtocol(): string | null;
	getCipher(): { name: string; version: string };
}

export type Connector = (options: ConnectionOptions) => SecureSocket;

export const defaultConnector: Connector = (options) => tlsConnect(options);

export type SessionTarget = {
	host: string;
	port: number;
};

/**
 * Line sink the transmission loop writes into.
 */
export interface LineSession {
	writeLine(line: string): Promise<void>;
	close(): void;
}

export function encodeLine(line: string): Buffer {
	return Buffer.from(`${line}\n`, "utf8");
}

export class TlsSession implements LineSession {
	private readonly logger = getChildLogger({ module: "tls-session" });
	private socket: SecureSocket | null = null;
	private currentState: SessionState = "unconnected";
	private socketError: Error | null = null;
	private negotiated: { protocol: string | null; cipher: string } | null = null;

	constructor(
		readonly target: SessionTarget,
		private readonly connector: Connector = defaultConnector,
	) {}

	get state(): SessionState {
		return this.currentState;
	}

	/** Negotiated protocol and cipher once the handshake completed. */
	get details(): { protocol: string | null; cipher: string } | null {
		return this.negotiated;
	}

	/**
	 * Open the connection and drive the handshake to completion.
	 * @throws {HandshakeError} with the socket already closed
	 */
	async connect(material: ContextMaterial): Promise<void> {
		if (this.currentState !== "unconnected") {
			throw new HandshakeError(
				`Session is ${this.currentState}; a session connects once`,
				this.target.host,
				this.target.port,
			);
		}

		const { host, port } = this.target;
		const options: ConnectionOptions = {
			host,
			port,
			// SNI only carries host names
			...(isIP(host) === 0 ? { servername: host } : {}),
			...material,
		};

		let socket: SecureSocket;
		try {
			socket = this.connector(options);
		} catch (err) {
			this.currentState = "failed";
			throw this.handshakeFailure(err);
		}
		this.socket = socket;

		// Keep one listener for the socket's lifetime so late errors never go unhandled
		socket.on("error", (err) => {
			this.socketError = err;
			this.logger.debug({ error: formatErrorSafe(err) }, "socket error");
		});
		socket.once("connect", () => {
			if (this.currentState === "unconnected") this.currentState = "connected";
		});

		try {
			await new Promise<void>((resolve, reject) => {
				const onSecure = () => {
					cleanup();
					resolve();
				};
				const onError = (err: Error) => {
					cleanup();
					reject(err);
				};
				const onClose = () => {
					cleanup();
					reject(new Error("connection closed before the handshake completed"));
				};
				const cleanup = () => {
					socket.removeListener("secureConnect", onSecure);
					socket.removeListener("error", onError);
					socket.removeListener("close", onClose);
				};

				socket.once("secureConnect", onSecure);
				socket.once("error", onError);
				socket.once("close", onClose);
			});
		} catch (err) {
			if (this.currentState !== "closed") this.currentState = "failed";
			this.socket = null;
			socket.destroy();
			throw this.handshakeFailure(err);
		}

		this.negotiated = { protocol: socket.getProtocol(), cipher: socket.getCipher().name };
		this.currentState = "handshake-complete";
		this.logger.info({ host, port, ...this.negotiated }, "handshake complete");
	}

	/**
	 * Write one UTF-8 line plus "\n" and wait until the socket accepted it.
	 * @throws {TransmissionIOError} when the session is not open or the write fails
	 */
	async writeLine(line: string): Promise<void> {
		const socket = this.socket;
		if (this.currentState !== "handshake-complete" || !socket) {
			throw new TransmissionIOError(`Session is ${this.currentState}`, "write");
		}
		if (this.socketError) {
			throw new TransmissionIOError(
				`Connection failed: ${this.socketError.message}`,
				"write",
				{ cause: this.socketError },
			);
		}
		if (socket.destroyed) {
			throw new TransmissionIOError("Connection closed by peer", "write");
		}

		const payload = encodeLine(line);
		await new Promise<void>((resolve, reject) => {
			socket.write(payload, (err) => {
				if (err) {
					reject(new TransmissionIOError(`Write failed: ${err.message}`, "write", { cause: err }));
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Release the connection. Safe to call in any state, any number of times.
	 */
	close(): void {
		const socket = this.socket;
		this.socket = null;
		if (this.currentState !== "failed" && this.currentState !== "closed" && socket) {
			this.currentState = "closed";
		}
		if (!socket) return;

		try {
			if (socket.destroyed) return;
			socket.end(() => {
				socket.destroy();
			});
		} catch (err) {
			this.logger.debug({ error: formatErrorSafe(err) }, "error while closing socket");
			socket.destroy();
		}
		this.logger.debug({ host: this.target.host, port: this.target.port }, "session closed");
	}

	private handshakeFailure(err: unknown): HandshakeError {
		const { host, port } = this.target;
		const hint = describeConnectFailure(err);
		const detail = err instanceof Error ? err.message : String(err);
		const message = hint
			? `TLS handshake with ${host}:${port} failed (${hint}): ${detail}`
			: `TLS handshake with ${host}:${port} failed: ${detail}`;
		this.logger.warn({ host, port, error: formatErrorSafe(err) }, "handshake failed");
		return new HandshakeError(message, host, port, { cause: err });
	}
}
