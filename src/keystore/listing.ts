/**
 * Read-only description of a store's entries. Key material never leaves
 * this module.
 */

import type { X509Certificate } from "node:crypto";

import { keyTypeOf } from "../tls/key-manager.js";
import { readIdentityEntries } from "./identity-store.js";
import type { StoreKind } from "./pkcs12.js";
import { readTrustAnchors } from "./trust-store.js";

export type StoreListing = {
	alias: string;
	keyType: string | null;
	subject: string;
	issuer: string;
	validTo: string;
	fingerprint256: string;
	chainLength: number;
};

function describeEntry(alias: string, chain: readonly X509Certificate[]): StoreListing[] {
	const [leaf] = chain;
	if (!leaf) return [];
	return [
		{
			alias,
			keyType: keyTypeOf(leaf),
			subject: leaf.subject,
			issuer: leaf.issuer,
			validTo: leaf.validTo,
			fingerprint256: leaf.fingerprint256,
			chainLength: chain.length,
		},
	];
}

/**
 * @throws {CredentialLoadError} or {TrustLoadError}, depending on `kind`
 */
export async function listStore(storePath: string, password: string, kind: StoreKind): Promise<StoreListing[]> {
	if (kind === "identity") {
		const entries = await readIdentityEntries(storePath, password);
		return entries.flatMap((entry) => describeEntry(entry.alias, entry.chain));
	}
	const anchors = await readTrustAnchors(storePath, password);
	return anchors.flatMap((anchor) => describeEntry(anchor.alias, [anchor.certificate]));
}
