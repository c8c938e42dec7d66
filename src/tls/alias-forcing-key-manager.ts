import type { KeyObject, X509Certificate } from "node:crypto";

import type { Principal, X509KeyManager } from "./key-manager.js";

/**
 * Wraps a key manager and forces client identity selection to one alias.
 *
 * The forced alias is only returned when the wrapped manager itself lists it
 * as valid for one of the requested key types; otherwise no identity is
 * presented. Every other operation is forwarded untouched.
 */
export class AliasForcingKeyManager implements X509KeyManager {
	constructor(
		private readonly base: X509KeyManager,
		readonly alias: string,
	) {}

	chooseClientAlias(keyTypes: readonly string[], issuers: readonly Principal[] | null): string | null {
		// First key type (in caller order) that lists the alias wins
		for (const keyType of keyTypes) {
			const validAliases = this.base.getClientAliases(keyType, issuers);
			if (validAliases?.includes(this.alias)) {
				return this.alias;
			}
		}
		return null;
	}

	chooseServerAlias(keyType: string, issuers: readonly Principal[] | null): string | null {
		return this.base.chooseServerAlias(keyType, issuers);
	}

	getCertificateChain(alias: string): X509Certificate[] | null {
		return this.base.getCertificateChain(alias);
	}

	getClientAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null {
		return this.base.getClientAliases(keyType, issuers);
	}

	getPrivateKey(alias: string): KeyObject | null {
		return this.base.getPrivateKey(alias);
	}

	getServerAliases(keyType: string, issuers: readonly Principal[] | null): string[] | null {
		return this.base.getServerAliases(keyType, issuers);
	}
}
