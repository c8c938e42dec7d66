/**
 * Identity store loader and the store-backed key manager.
 *
 * Stores are PKCS#12 files; every private key entry is one identity, named by
 * its friendlyName.
 */

import type { KeyObject, X509Certificate } from "node:crypto";

import { CredentialLoadError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import {
	type Principal,
	type X509KeyManager,
	keyTypeOf,
	sameKeyType,
} from "../tls/key-manager.js";
import { type Pkcs12Contents, Pkcs12Error, readPkcs12 } from "./pkcs12.js";

export type IdentityEntry = {
	alias: string;
	chain: X509Certificate[];
	privateKey: KeyObject;
};

function issuedByAny(chain: readonly X509Certificate[], issuers: readonly Principal[] | null) {
	if (!issuers || issuers.length === 0) return true;
	return chain.some((cert) => issuers.includes(cert.issuer));
}

/**
 * Key manager over decoded identity entries. Valid aliases are computed per
 * request from the key type and acceptable issuers, in store order.
 */
export class StoreKeyManager implements X509KeyManager {
	constructor(private readonly entries: readonly IdentityEntry[]) {}

	chooseClientAlias(keyTypes: readonly string[], issuers: readonly Principal[] | null): string | null {
		for (const keyType of keyTypes) {
			const aliases = this.getClientAliases(keyType, issuers);
			if (aliases) return aliases[0] ?? null;
		}
		return null;
	}

	chooseServerAlias(keyType: string, issuers: readonly Principal[] | null): string | null {
		return this.getServerAliases(keyType, issuers)?.[0] ?? null;
	}

	getCertificateChain(alias: string): X509Certificate[] | null {
		const entry = this.find(alias);
		return entry ? [...entry.chain] : null;
	}

	getClientAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null {
		return this.matching(keyType, issuers);
	}

	getPrivateKey(alias: string): KeyObject | null {
		return this.find(alias)?.privateKey ?? null;
	}

	getServerAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null {
		return this.matching(keyType, issuers);
	}

	private find(alias: string): IdentityEntry | undefined {
		return this.entries.find((entry) => entry.alias === alias);
	}

	private matching(keyType: string, issuers: readonly Principal[] | null): string[] | null {
		const aliases = this.entries
			.filter((entry) => {
				const leaf = entry.chain[0];
				const type = leaf ? keyTypeOf(leaf) : null;
				return type !== null && sameKeyType(type, keyType) && issuedByAny(entry.chain, issuers);
			})
			.map((entry) => entry.alias);
		return aliases.length > 0 ? aliases : null;
	}
}

/**
 * Pair each private key with its certificate chain, leaf first.
 *
 * The leaf is the certificate bag sharing the key's localKeyId (or, failing
 * that, its friendlyName). The rest of the chain is followed through the
 * store's other certificates by issuer.
 */
export function identityEntriesOf(contents: Pkcs12Contents): IdentityEntry[] {
	return contents.keys.map((key, index) => {
		const alias = key.friendlyName ?? String(index + 1);
		const leaf = contents.certificates.find((cert) =>
			key.localKeyId !== null
				? cert.localKeyId === key.localKeyId
				: cert.friendlyName !== null && cert.friendlyName === key.friendlyName,
		);
		if (!leaf) {
			throw new Error(`identity '${alias}' has no certificate`);
		}

		const chain = [leaf.certificate];
		let current = leaf.certificate;
		while (current.subject !== current.issuer) {
			const child = current;
			const next = contents.certificates.find(
				(cert) => !chain.includes(cert.certificate) && child.checkIssued(cert.certificate),
			);
			if (!next) break;
			chain.push(next.certificate);
			current = next.certificate;
		}
		return { alias, chain, privateKey: key.privateKey };
	});
}

/**
 * Read the identities of a PKCS#12 store, in file order.
 * @throws {CredentialLoadError} for a missing, unreadable or undecodable store, a wrong password,
 * or a store without private keys
 */
export async function readIdentityEntries(filePath: string, password: string): Promise<IdentityEntry[]> {
	let contents: Pkcs12Contents;
	try {
		contents = await readPkcs12(filePath, password);
	} catch (err) {
		if (err instanceof Pkcs12Error) {
			throw new CredentialLoadError(err.message, err.code, filePath, { cause: err });
		}
		throw new CredentialLoadError(
			`Cannot load identity store ${filePath}: ${String(err)}`,
			"UNREADABLE",
			filePath,
			{ cause: err },
		);
	}

	if (contents.keys.length === 0) {
		throw new CredentialLoadError(
			`Store ${filePath} holds no private keys; is it a trust store?`,
			"WRONG_KIND",
			filePath,
		);
	}

	try {
		return identityEntriesOf(contents);
	} catch (err) {
		throw new CredentialLoadError(`Identity store ${filePath}: ${String(err)}`, "MALFORMED", filePath, {
			cause: err,
		});
	}
}

/**
 * Open a password-protected identity store and expose it as a key manager.
 * @throws {CredentialLoadError} as {@link readIdentityEntries}
 */
export async function loadIdentityStore(filePath: string, password: string): Promise<StoreKeyManager> {
	const logger = getChildLogger({ module: "identity-store" });
	const entries = await readIdentityEntries(filePath, password);
	logger.debug({ filePath, aliases: entries.map((e) => e.alias) }, "loaded identity store");
	return new StoreKeyManager(entries);
}
