import { EventEmitter } from "node:events";
import type { ConnectionOptions } from "node:tls";

import type { Connector, SecureSocket } from "../../src/tls/session.js";

/**
 * In-process stand-in for a TLS socket. Tests drive the handshake by emitting
 * the socket events themselves.
 */
export class FakeSecureSocket extends EventEmitter implements SecureSocket {
	destroyed = false;
	ended = false;
	readonly writes: string[] = [];
	failWritesWith: Error | null = null;

	write(data: Uint8Array, callback: (err?: Error | null) => void): boolean {
		const failure = this.failWritesWith;
		if (failure) {
			queueMicrotask(() => callback(failure));
			return false;
		}
		this.writes.push(Buffer.from(data).toString("utf8"));
		queueMicrotask(() => callback(null));
		return true;
	}

	end(callback?: () => void): this {
		this.ended = true;
		if (callback) queueMicrotask(callback);
		return this;
	}

	destroy(): this {
		this.destroyed = true;
		return this;
	}

	getProtocol(): string | null {
		return "TLSv1.3";
	}

	getCipher(): { name: string; version: string } {
		return { name: "TLS_AES_256_GCM_SHA384", version: "TLSv1.3" };
	}

	/** Complete the handshake on the next tick. */
	succeed(): void {
		queueMicrotask(() => {
			this.emit("connect");
			this.emit("secureConnect");
		});
	}

	fail(err: Error): void {
		queueMicrotask(() => {
			this.emit("error", err);
			this.emit("close", true);
		});
	}
}

export type RecordingConnector = {
	connector: Connector;
	sockets: FakeSecureSocket[];
	options: ConnectionOptions[];
};

/**
 * Connector that hands out fake sockets and records the options it was given.
 * `script` decides how each socket's handshake ends.
 */
export function recordingConnector(
	script: (socket: FakeSecureSocket) => void = (socket) => socket.succeed(),
): RecordingConnector {
	const sockets: FakeSecureSocket[] = [];
	const options: ConnectionOptions[] = [];
	return {
		sockets,
		options,
		connector: (opts) => {
			const socket = new FakeSecureSocket();
			sockets.push(socket);
			options.push(opts);
			script(socket);
			return socket;
		},
	};
}
