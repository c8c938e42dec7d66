/**
 * Trust store loader.
 *
 * Trust anchors are the certificate entries of a PKCS#12 store that belong to
 * no private key.
 */

import type { X509Certificate } from "node:crypto";

import { TrustLoadError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { X509TrustManager } from "../tls/key-manager.js";
import { type Pkcs12Contents, Pkcs12Error, readPkcs12 } from "./pkcs12.js";

export type TrustAnchor = {
	alias: string;
	certificate: X509Certificate;
};

export class StoreTrustManager implements X509TrustManager {
	constructor(private readonly anchors: readonly TrustAnchor[]) {}

	getAcceptedIssuers(): X509Certificate[] {
		return this.anchors.map((anchor) => anchor.certificate);
	}
}

export function trustAnchorsOf(contents: Pkcs12Contents): TrustAnchor[] {
	const keyIds = new Set(contents.keys.map((key) => key.localKeyId).filter((id) => id !== null));
	return contents.certificates
		.filter((cert) => cert.localKeyId === null || !keyIds.has(cert.localKeyId))
		.map((cert, index) => ({
			alias: cert.friendlyName ?? String(index + 1),
			certificate: cert.certificate,
		}));
}

/**
 * Read the trust anchors of a PKCS#12 store, in file order. An empty store
 * yields no anchors.
 * @throws {TrustLoadError} for a missing, unreadable or undecodable store, a wrong password,
 * or a store holding only identities
 */
export async function readTrustAnchors(filePath: string, password: string): Promise<TrustAnchor[]> {
	let contents: Pkcs12Contents;
	try {
		contents = await readPkcs12(filePath, password);
	} catch (err) {
		if (err instanceof Pkcs12Error) {
			throw new TrustLoadError(err.message, err.code, filePath, { cause: err });
		}
		throw new TrustLoadError(`Cannot load trust store ${filePath}: ${String(err)}`, "UNREADABLE", filePath, {
			cause: err,
		});
	}

	const anchors = trustAnchorsOf(contents);
	if (anchors.length === 0 && contents.keys.length > 0) {
		throw new TrustLoadError(
			`Store ${filePath} holds only identities; is it an identity store?`,
			"WRONG_KIND",
			filePath,
		);
	}
	return anchors;
}

/**
 * Open a password-protected trust store and expose its anchors.
 * @throws {TrustLoadError} as {@link readTrustAnchors}
 */
export async function loadTrustStore(filePath: string, password: string): Promise<StoreTrustManager> {
	const logger = getChildLogger({ module: "trust-store" });
	const anchors = await readTrustAnchors(filePath, password);
	logger.debug({ filePath, anchors: anchors.map((a) => a.alias) }, "loaded trust store");
	return new StoreTrustManager(anchors);
}
