import fs from "node:fs";
import path from "node:path";

import { afterAll, afterEach, describe, expect, it } from "vitest";

import { resolveClientDefaults } from "../../src/client/defaults.js";
import { getTlsConfig, loadConfig, resetConfigCache } from "../../src/config/config.js";
import { CONFIG_ENV, resolveConfigPath, setConfigPath } from "../../src/config/path.js";
import { CONFIG_DIR } from "../../src/utils.js";
import { makeTempDir } from "../helpers/pki.js";

const { dir, cleanup } = makeTempDir("alias-tls-config-");
const configPath = path.join(dir, "config.json");

afterAll(() => {
	cleanup();
});

afterEach(() => {
	resetConfigCache();
	setConfigPath(null);
	fs.rmSync(configPath, { force: true });
});

describe("config path", () => {
	it("prefers the override, then the environment, then the default", () => {
		const env = { [CONFIG_ENV]: "/etc/alias-tls.json" };
		expect(resolveConfigPath({})).toBe(path.join(CONFIG_DIR, "config.json"));
		expect(resolveConfigPath({ [CONFIG_ENV]: "" })).toBe(path.join(CONFIG_DIR, "config.json"));
		expect(resolveConfigPath(env)).toBe("/etc/alias-tls.json");
		setConfigPath(configPath);
		expect(resolveConfigPath(env)).toBe(configPath);
	});
});

describe("loadConfig", () => {
	it("returns an empty config when the file is missing", () => {
		setConfigPath(path.join(dir, "absent.json"));
		expect(loadConfig()).toEqual({});
	});

	it("parses JSON5 with comments", () => {
		setConfigPath(configPath);
		fs.writeFileSync(
			configPath,
			`{
				// lab defaults
				client: { host: "lab.test", port: 9443, alias: "clientB" },
				tls: { keyTypes: ["EC"], minVersion: "TLSv1.3" },
			}`,
		);
		expect(loadConfig()).toEqual({
			client: { host: "lab.test", port: 9443, alias: "clientB" },
			tls: { keyTypes: ["EC"], minVersion: "TLSv1.3" },
		});
	});

	it("rejects an out-of-range port", () => {
		setConfigPath(configPath);
		fs.writeFileSync(configPath, JSON.stringify({ client: { port: 70000 } }));
		expect(() => loadConfig()).toThrow();
	});

	it("rejects unknown key types", () => {
		setConfigPath(configPath);
		fs.writeFileSync(configPath, JSON.stringify({ tls: { keyTypes: ["DSA"] } }));
		expect(() => loadConfig()).toThrow();
	});

	it("reloads after the file changes", () => {
		setConfigPath(configPath);
		fs.writeFileSync(configPath, JSON.stringify({ client: { host: "first.test" } }));
		expect(loadConfig().client?.host).toBe("first.test");

		fs.writeFileSync(configPath, JSON.stringify({ client: { host: "second.test" } }));
		const later = new Date(Date.now() + 5000);
		fs.utimesSync(configPath, later, later);
		expect(loadConfig().client?.host).toBe("second.test");
	});
});

describe("getTlsConfig", () => {
	it("applies defaults when the section is absent", () => {
		expect(getTlsConfig({})).toEqual({ keyTypes: ["RSA", "EC"] });
	});

	it("keeps configured values", () => {
		expect(getTlsConfig({ tls: { keyTypes: ["Ed25519"], issuers: ["CN=Lab CA"] } })).toEqual({
			keyTypes: ["Ed25519"],
			issuers: ["CN=Lab CA"],
		});
	});
});

describe("resolveClientDefaults", () => {
	it("uses built-in values without a client section", () => {
		const defaults = resolveClientDefaults();
		expect(defaults.host).toBe("localhost");
		expect(defaults.port).toBe(8087);
		expect(defaults.identityStore).toEqual({
			path: path.join(CONFIG_DIR, "keys", "clientKeys.p12"),
			password: "password",
		});
		expect(defaults.trustStore.path).toBe(path.join(CONFIG_DIR, "keys", "clientTrust.p12"));
		expect(defaults.alias).toBeUndefined();
	});

	it("overlays the config file's client section", () => {
		const defaults = resolveClientDefaults({
			host: "lab.test",
			identityStore: { path: "/srv/ids" },
			alias: "clientB",
		});
		expect(defaults.host).toBe("lab.test");
		expect(defaults.identityStore).toEqual({ path: "/srv/ids", password: "password" });
		expect(defaults.alias).toBe("clientB");
	});
});
