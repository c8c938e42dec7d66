import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

import { categorize, installUnhandledRejectionHandler } from "../../src/infra/unhandled-rejections.js";

describe("infra/unhandled-rejections categorize", () => {
	it("classifies abort errors", () => {
		expect(categorize({ name: "AbortError", message: "This operation was aborted" })).toBe("abort");
	});

	it("classifies dropped connections", () => {
		expect(categorize({ code: "ECONNRESET", message: "socket hang up" })).toBe("connection");
	});

	it("falls back to unknown for unmatched errors", () => {
		expect(categorize(new Error("unexpected runtime failure"))).toBe("unknown");
	});
});

describe("installUnhandledRejectionHandler", () => {
	const before = process.listeners("unhandledRejection");

	afterEach(() => {
		for (const listener of process.listeners("unhandledRejection")) {
			if (!before.includes(listener)) process.removeListener("unhandledRejection", listener);
		}
		process.exitCode = undefined;
	});

	function installedListener(report: (message: string) => void) {
		installUnhandledRejectionHandler(report);
		const added = process.listeners("unhandledRejection").filter((l) => !before.includes(l));
		const [listener] = added;
		if (!listener) throw new Error("handler not installed");
		return listener;
	}

	it("reports unknown rejections and sets a failing exit code", () => {
		const report = vi.fn();
		const listener = installedListener(report);
		listener(new Error("boom"), Promise.resolve());
		expect(report).toHaveBeenCalledWith("Error: Error: boom");
		expect(process.exitCode).toBe(1);
	});

	it("stays quiet for aborts", () => {
		const report = vi.fn();
		const listener = installedListener(report);
		listener({ name: "AbortError" }, Promise.resolve());
		expect(report).not.toHaveBeenCalled();
		expect(process.exitCode).toBeUndefined();
	});
});
