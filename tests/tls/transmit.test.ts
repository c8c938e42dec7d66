import { PassThrough, Readable } from "node:stream";

import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { TransmissionIOError } from "../../src/errors.js";
import type { LineSession } from "../../src/tls/session.js";
import { transmit } from "../../src/tls/transmit.js";

function recordingSession(failOn?: string) {
	const lines: string[] = [];
	const close = vi.fn();
	const session: LineSession = {
		async writeLine(line) {
			if (line === failOn) {
				throw new TransmissionIOError("Write failed: write EPIPE", "write");
			}
			lines.push(line);
		},
		close,
	};
	return { session, lines, close };
}

describe("transmit", () => {
	it("sends each input line and closes the session at end of input", async () => {
		const { session, lines, close } = recordingSession();
		const result = await transmit(Readable.from(["hello\nwor", "ld\r\n", "last"]), session);

		expect(result).toEqual({ linesSent: 3, error: null });
		expect(lines).toEqual(["hello", "world", "last"]);
		expect(close).toHaveBeenCalled();
	});

	it("sends nothing for empty input", async () => {
		const { session, lines, close } = recordingSession();
		const result = await transmit(Readable.from([]), session);
		expect(result).toEqual({ linesSent: 0, error: null });
		expect(lines).toEqual([]);
		expect(close).toHaveBeenCalled();
	});

	it("keeps blank lines", async () => {
		const { session, lines } = recordingSession();
		await transmit(Readable.from(["a\n\nb\n"]), session);
		expect(lines).toEqual(["a", "", "b"]);
	});

	it("stops at the first failed write", async () => {
		const { session, lines, close } = recordingSession("boom");
		const result = await transmit(Readable.from(["one\nboom\nthree\n"]), session);

		expect(result.linesSent).toBe(1);
		expect(result.error?.message).toBe("Write failed: write EPIPE");
		expect(result.error?.direction).toBe("write");
		expect(lines).toEqual(["one"]);
		expect(close).toHaveBeenCalled();
	});

	it("reports a failing input stream as a read error", async () => {
		const { session, close } = recordingSession();
		const input = new PassThrough();
		const pending = transmit(input, session);
		input.write("first\n");
		setImmediate(() => input.destroy(new Error("disk gone")));

		const result = await pending;
		expect(result.error).toBeInstanceOf(TransmissionIOError);
		expect(result.error?.direction).toBe("read");
		expect(result.error?.message).toBe("Reading input failed: Error: disk gone");
		expect(close).toHaveBeenCalled();
	});

	it("stops reading when aborted", async () => {
		const { session, lines, close } = recordingSession();
		const input = new PassThrough();
		const controller = new AbortController();
		const pending = transmit(input, session, { signal: controller.signal });
		input.write("before\n");
		setImmediate(() => controller.abort());

		const result = await pending;
		expect(result.error).toBeNull();
		expect(lines).toEqual(["before"]);
		expect(close).toHaveBeenCalled();
	});

	it("does not read at all when already aborted", async () => {
		const { session, lines } = recordingSession();
		const controller = new AbortController();
		controller.abort();
		const result = await transmit(Readable.from(["ignored\n"]), session, { signal: controller.signal });
		expect(result).toEqual({ linesSent: 0, error: null });
		expect(lines).toEqual([]);
	});
});
