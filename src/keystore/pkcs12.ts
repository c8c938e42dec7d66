/**
 * PKCS#12 (.p12/.pfx) reading through node-forge.
 *
 * The file format, the password-based decryption and the MAC check all
 * belong to node-forge. This module only turns the decoded bags into node
 * KeyObject and X509Certificate values, in file order.
 */

import { type KeyObject, X509Certificate, createPrivateKey } from "node:crypto";
import { type FileHandle, open } from "node:fs/promises";

import forge from "node-forge";
import { z } from "zod";

import type { StoreLoadCode } from "../errors.js";
import { isErrnoException } from "../utils.js";

export const StoreKindSchema = z.enum(["identity", "trust"]);
export type StoreKind = z.infer<typeof StoreKindSchema>;

const BagAttributesSchema = z
	.object({
		friendlyName: z.array(z.string()).optional(),
		localKeyId: z.array(z.string()).optional(),
	})
	.passthrough();

export type Pkcs12Key = {
	friendlyName: string | null;
	localKeyId: string | null;
	privateKey: KeyObject;
};

export type Pkcs12Certificate = {
	friendlyName: string | null;
	localKeyId: string | null;
	certificate: X509Certificate;
};

export type Pkcs12Contents = {
	keys: Pkcs12Key[];
	certificates: Pkcs12Certificate[];
};

export class Pkcs12Error extends Error {
	constructor(
		message: string,
		public readonly code: StoreLoadCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "Pkcs12Error";
	}
}

async function readStoreBytes(filePath: string): Promise<Buffer> {
	let handle: FileHandle;
	try {
		handle = await open(filePath, "r");
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			throw new Pkcs12Error(`Store not found: ${filePath}`, "NOT_FOUND", { cause: err });
		}
		throw new Pkcs12Error(`Cannot open store ${filePath}: ${String(err)}`, "UNREADABLE", {
			cause: err,
		});
	}

	try {
		return await handle.readFile();
	} catch (err) {
		throw new Pkcs12Error(`Cannot read store ${filePath}: ${String(err)}`, "UNREADABLE", {
			cause: err,
		});
	} finally {
		await handle.close();
	}
}

function toDerBuffer(value: forge.asn1.Asn1): Buffer {
	return Buffer.from(forge.asn1.toDer(value).getBytes(), "binary");
}

function attributesOf(bag: forge.pkcs12.Bag): { friendlyName: string | null; localKeyId: string | null } {
	const parsed = BagAttributesSchema.safeParse(bag.attributes);
	if (!parsed.success) return { friendlyName: null, localKeyId: null };
	return {
		friendlyName: parsed.data.friendlyName?.[0] ?? null,
		localKeyId: parsed.data.localKeyId?.[0] ?? null,
	};
}

// node-forge decodes RSA keys itself and hands back raw PKCS#8 for every other algorithm
function privateKeyOf(bag: forge.pkcs12.Bag): KeyObject {
	if (bag.key) {
		return createPrivateKey(forge.pki.privateKeyToPem(bag.key));
	}
	if (bag.asn1) {
		return createPrivateKey({ key: toDerBuffer(bag.asn1), format: "der", type: "pkcs8" });
	}
	throw new Error("key bag carries no key");
}

// Same split for certificates: forge parses RSA ones, the rest stay as ASN.1
function certificateOf(bag: forge.pkcs12.Bag): X509Certificate {
	if (bag.cert) {
		return new X509Certificate(toDerBuffer(forge.pki.certificateToAsn1(bag.cert)));
	}
	if (bag.asn1) {
		return new X509Certificate(toDerBuffer(bag.asn1));
	}
	throw new Error("certificate bag carries no certificate");
}

function decodePfx(filePath: string, bytes: Buffer, password: string): forge.pkcs12.Pkcs12Pfx {
	try {
		const asn1 = forge.asn1.fromDer(bytes.toString("binary"));
		return forge.pkcs12.pkcs12FromAsn1(asn1, password);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		// node-forge reports a failed MAC check or key decryption as a password problem
		if (/password/i.test(message)) {
			throw new Pkcs12Error(`Wrong password for store ${filePath}`, "BAD_PASSWORD", { cause: err });
		}
		throw new Pkcs12Error(`Store ${filePath} is not a PKCS#12 file: ${message}`, "MALFORMED", {
			cause: err,
		});
	}
}

/**
 * Open a PKCS#12 file and return its keys and certificates in file order.
 * @throws {Pkcs12Error} for a missing or unreadable file, a wrong password, or undecodable content
 */
export async function readPkcs12(filePath: string, password: string): Promise<Pkcs12Contents> {
	const pfx = decodePfx(filePath, await readStoreBytes(filePath), password);

	const contents: Pkcs12Contents = { keys: [], certificates: [] };
	const { keyBag, pkcs8ShroudedKeyBag, certBag } = forge.pki.oids;

	for (const safeContents of pfx.safeContents) {
		for (const bag of safeContents.safeBags) {
			const attributes = attributesOf(bag);
			try {
				if (bag.type === keyBag || bag.type === pkcs8ShroudedKeyBag) {
					contents.keys.push({ ...attributes, privateKey: privateKeyOf(bag) });
				} else if (bag.type === certBag) {
					contents.certificates.push({ ...attributes, certificate: certificateOf(bag) });
				}
			} catch (err) {
				const label = attributes.friendlyName ?? "(unnamed)";
				throw new Pkcs12Error(
					`Entry '${label}' in ${filePath} does not decode: ${String(err)}`,
					"MALFORMED",
					{ cause: err },
				);
			}
		}
	}

	return contents;
}
