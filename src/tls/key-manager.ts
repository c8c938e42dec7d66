/**
 * Identity and trust capabilities handed to the session layer.
 *
 * The store-backed managers and the alias-forcing decorator are both
 * variants of X509KeyManager and can stand in for one another anywhere.
 */

import type { KeyObject, X509Certificate } from "node:crypto";

/**
 * Distinguished name in the format node's X509Certificate reports
 * (`issuer` / `subject`), e.g. "CN=Test Root CA\nO=Example Test".
 */
export type Principal = string;

export interface X509KeyManager {
	/**
	 * Pick the identity to present to a server.
	 * @param keyTypes acceptable key algorithm names, in order of preference
	 * @param issuers acceptable CA subject names; null or empty accepts any
	 * @returns the alias, or null to present no certificate
	 */
	chooseClientAlias(keyTypes: readonly string[], issuers: readonly Principal[] | null): string | null;
	chooseServerAlias(keyType: string, issuers: readonly Principal[] | null): string | null;
	getCertificateChain(alias: string): X509Certificate[] | null;
	getClientAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null;
	getPrivateKey(alias: string): KeyObject | null;
	getServerAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null;
}

export interface X509TrustManager {
	/** Trust anchors, in store order. */
	getAcceptedIssuers(): X509Certificate[];
}

const KEY_TYPE_NAMES: Record<string, string> = {
	rsa: "RSA",
	"rsa-pss": "RSA",
	ec: "EC",
	ed25519: "Ed25519",
	ed448: "Ed448",
};

/**
 * Key algorithm name of a certificate's public key, in TLS provider terms.
 */
export function keyTypeOf(cert: X509Certificate): string | null {
	const type = cert.publicKey.asymmetricKeyType;
	if (!type) return null;
	return KEY_TYPE_NAMES[type] ?? null;
}

export function sameKeyType(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase();
}
