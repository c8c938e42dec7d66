/**
 * TLS client context construction.
 *
 * node:tls fixes the client certificate on the context before the handshake
 * starts, so the identity is selected here, once, through the key manager.
 * Whatever alias comes back is the one the handshake presents.
 */

import type { ConnectionOptions, SecureVersion } from "node:tls";

import { getChildLogger } from "../logging.js";
import type { Principal, X509KeyManager, X509TrustManager } from "./key-manager.js";

export type ContextMaterial = Pick<ConnectionOptions, "ca" | "key" | "cert" | "minVersion">;

export type ClientContext = {
	/** Alias presented to the server, or null for no client certificate. */
	clientAlias: string | null;
	material: ContextMaterial;
};

export type ClientContextOptions = {
	keyManager?: X509KeyManager;
	trustManager?: X509TrustManager;
	keyTypes: readonly string[];
	issuers?: readonly Principal[] | null;
	minVersion?: SecureVersion;
};

/**
 * Resolve trust anchors and client identity into connection material.
 * Without a trust manager node's bundled roots apply; without a key manager no
 * identity is offered.
 */
export function buildClientContext(options: ClientContextOptions): ClientContext {
	const logger = getChildLogger({ module: "tls-context" });
	const material: ContextMaterial = {};

	if (options.minVersion) {
		material.minVersion = options.minVersion;
	}

	if (options.trustManager) {
		material.ca = options.trustManager.getAcceptedIssuers().map((cert) => cert.toString());
	}

	let clientAlias: string | null = null;
	const keyManager = options.keyManager;
	if (keyManager) {
		const chosen = keyManager.chooseClientAlias(options.keyTypes, options.issuers ?? null);
		if (chosen !== null) {
			const privateKey = keyManager.getPrivateKey(chosen);
			const chain = keyManager.getCertificateChain(chosen);
			if (privateKey && chain && chain.length > 0) {
				material.key = privateKey.export({ format: "pem", type: "pkcs8" });
				material.cert = chain.map((cert) => cert.toString()).join("");
				clientAlias = chosen;
			} else {
				logger.warn({ alias: chosen }, "selected alias has no key material; presenting no identity");
			}
		}
	}

	logger.debug(
		{
			clientAlias,
			keyTypes: options.keyTypes,
			anchors: Array.isArray(material.ca) ? material.ca.length : "system",
		},
		"built client context",
	);

	return { clientAlias, material };
}
