/**
 * Client profiles.
 *
 * Each profile adds one option layer (and the matching piece of TLS context)
 * on top of the previous one: plain connection, custom identity store, custom
 * trust store, forced alias.
 */

import type { TlsConfig } from "../config/config.js";
import { loadIdentityStore } from "../keystore/identity-store.js";
import { loadTrustStore } from "../keystore/trust-store.js";
import { OptionChain } from "../options/chain.js";
import {
	aliasLayer,
	connectionLayer,
	identityStoreLayer,
	trustStoreLayer,
} from "../options/layers.js";
import type { ClientConfiguration } from "../options/types.js";
import { AliasForcingKeyManager } from "../tls/alias-forcing-key-manager.js";
import { type ClientContext, buildClientContext } from "../tls/context.js";
import type { X509KeyManager } from "../tls/key-manager.js";

export const PROFILE_NAMES = ["simple", "keystore", "truststore", "select-alias"] as const;
export type ProfileName = (typeof PROFILE_NAMES)[number];

export interface ClientProfile {
	readonly name: ProfileName;
	readonly description: string;
	readonly chain: OptionChain;
	/**
	 * Load whatever stores this profile uses and resolve the TLS context.
	 * @throws {CredentialLoadError} / {TrustLoadError} when a store cannot be opened
	 */
	buildContext(config: ClientConfiguration, tls: TlsConfig): Promise<ClientContext>;
}

function contextOptions(tls: TlsConfig) {
	return {
		keyTypes: tls.keyTypes,
		issuers: tls.issuers ?? null,
		...(tls.minVersion ? { minVersion: tls.minVersion } : {}),
	};
}

const simpleProfile: ClientProfile = {
	name: "simple",
	description: "system trust roots, no client identity",
	chain: new OptionChain([connectionLayer]),
	async buildContext(_config, tls) {
		return buildClientContext(contextOptions(tls));
	},
};

const keystoreProfile: ClientProfile = {
	name: "keystore",
	description: "client identity from the identity store, system trust roots",
	chain: new OptionChain([identityStoreLayer, connectionLayer]),
	async buildContext(config, tls) {
		const keyManager = await loadIdentityStore(config.identityStore.path, config.identityStore.password);
		return buildClientContext({ ...contextOptions(tls), keyManager });
	},
};

const truststoreProfile: ClientProfile = {
	name: "truststore",
	description: "client identity and trust anchors from their stores",
	chain: new OptionChain([trustStoreLayer, identityStoreLayer, connectionLayer]),
	async buildContext(config, tls) {
		const trustManager = await loadTrustStore(config.trustStore.path, config.trustStore.password);
		const keyManager = await loadIdentityStore(config.identityStore.path, config.identityStore.password);
		return buildClientContext({ ...contextOptions(tls), keyManager, trustManager });
	},
};

const selectAliasProfile: ClientProfile = {
	name: "select-alias",
	description: "both stores, with the client identity forced by -alias",
	chain: new OptionChain([aliasLayer, trustStoreLayer, identityStoreLayer, connectionLayer]),
	async buildContext(config, tls) {
		const storeKeyManager = await loadIdentityStore(
			config.identityStore.path,
			config.identityStore.password,
		);
		const trustManager = await loadTrustStore(config.trustStore.path, config.trustStore.password);

		const keyManager: X509KeyManager =
			config.alias !== undefined
				? new AliasForcingKeyManager(storeKeyManager, config.alias)
				: storeKeyManager;
		return buildClientContext({ ...contextOptions(tls), keyManager, trustManager });
	},
};

const PROFILES: Record<ProfileName, ClientProfile> = {
	simple: simpleProfile,
	keystore: keystoreProfile,
	truststore: truststoreProfile,
	"select-alias": selectAliasProfile,
};

export function getProfile(name: ProfileName): ClientProfile {
	return PROFILES[name];
}

export function isProfileName(value: string): value is ProfileName {
	return PROFILE_NAMES.some((name) => name === value);
}
