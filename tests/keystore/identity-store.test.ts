import { writeFileSync } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { CredentialLoadError } from "../../src/errors.js";
import { loadIdentityStore, readIdentityEntries } from "../../src/keystore/identity-store.js";
import {
	IDENTITY_STORE,
	STORE_PASSWORD,
	TRUST_STORE,
	fixtureCert,
	makeTempDir,
} from "../helpers/pki.js";

async function loadError(filePath: string, password: string): Promise<CredentialLoadError> {
	try {
		await loadIdentityStore(filePath, password);
	} catch (err) {
		if (err instanceof CredentialLoadError) return err;
		throw err;
	}
	throw new Error("expected load to fail");
}

describe("loadIdentityStore", () => {
	it("reads every key entry under its friendlyName in file order", async () => {
		const entries = await readIdentityEntries(IDENTITY_STORE, STORE_PASSWORD);
		expect(entries.map((entry) => entry.alias)).toEqual(["clientA", "clientEC", "clientB", "clientOther"]);
		expect(entries.map((entry) => entry.chain.length)).toEqual([1, 1, 1, 1]);
		expect(entries[1]?.privateKey.asymmetricKeyType).toBe("ec");
		expect(entries[1]?.chain[0]?.fingerprint256).toBe(fixtureCert("client-ec").fingerprint256);
	});

	it("lists valid client aliases per key type in store order", async () => {
		const keyManager = await loadIdentityStore(IDENTITY_STORE, STORE_PASSWORD);
		expect(keyManager.getClientAliases("RSA", null)).toEqual(["clientA", "clientB", "clientOther"]);
		expect(keyManager.getClientAliases("ec", null)).toEqual(["clientEC"]);
		expect(keyManager.getClientAliases("Ed25519", null)).toBeNull();
	});

	it("filters by acceptable issuers", async () => {
		const keyManager = await loadIdentityStore(IDENTITY_STORE, STORE_PASSWORD);
		const otherRoot = fixtureCert("other-ca").subject;
		expect(keyManager.getClientAliases("RSA", [otherRoot])).toEqual(["clientOther"]);
		expect(keyManager.getClientAliases("EC", [otherRoot])).toBeNull();
		expect(keyManager.getClientAliases("RSA", [])).toEqual(["clientA", "clientB", "clientOther"]);
	});

	it("chooses the first alias of the first key type that has one", async () => {
		const keyManager = await loadIdentityStore(IDENTITY_STORE, STORE_PASSWORD);
		expect(keyManager.chooseClientAlias(["EC", "RSA"], null)).toBe("clientEC");
		expect(keyManager.chooseClientAlias(["RSA", "EC"], null)).toBe("clientA");
		expect(keyManager.chooseClientAlias(["Ed448"], null)).toBeNull();
		expect(keyManager.chooseServerAlias("RSA", null)).toBe("clientA");
	});

	it("exposes key material by alias", async () => {
		const keyManager = await loadIdentityStore(IDENTITY_STORE, STORE_PASSWORD);
		const chain = keyManager.getCertificateChain("clientB");
		expect(chain?.map((cert) => cert.fingerprint256)).toEqual([fixtureCert("client-b").fingerprint256]);
		const key = keyManager.getPrivateKey("clientB");
		expect(key?.type).toBe("private");
		expect(key && chain?.[0]?.checkPrivateKey(key)).toBe(true);
		expect(keyManager.getCertificateChain("missing")).toBeNull();
		expect(keyManager.getPrivateKey("missing")).toBeNull();
	});

	it("fails with BAD_PASSWORD on a wrong password", async () => {
		const error = await loadError(IDENTITY_STORE, "wrong-secret");
		expect(error.code).toBe("BAD_PASSWORD");
		expect(error.storePath).toBe(IDENTITY_STORE);
		expect(error.message).toBe(`Wrong password for store ${IDENTITY_STORE}`);
	});

	it("fails with WRONG_KIND for a store without private keys", async () => {
		expect((await loadError(TRUST_STORE, STORE_PASSWORD)).code).toBe("WRONG_KIND");
	});

	describe("with files on disk", () => {
		let dir: string;
		let cleanup: () => void;

		beforeEach(() => {
			({ dir, cleanup } = makeTempDir());
		});

		afterEach(() => {
			cleanup();
		});

		it("fails with NOT_FOUND for a missing store", async () => {
			const missing = path.join(dir, "nope.p12");
			const error = await loadError(missing, STORE_PASSWORD);
			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe(`Store not found: ${missing}`);
		});

		it("fails with MALFORMED for a file that is not PKCS#12", async () => {
			const badPath = path.join(dir, "keys.json");
			writeFileSync(badPath, '{"entries": []}\n');
			const error = await loadError(badPath, STORE_PASSWORD);
			expect(error.code).toBe("MALFORMED");
			expect(error.message.startsWith(`Store ${badPath} is not a PKCS#12 file: `)).toBe(true);
		});
	});
});
