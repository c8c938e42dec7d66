import { createInterface } from "node:readline";

import { TransmissionIOError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { LineSession } from "./session.js";

export type TransmitResult = {
	linesSent: number;
	/** Set when the loop stopped on an I/O failure rather than end of input. */
	error: TransmissionIOError | null;
};

export type TransmitOptions = {
	/** Aborting stops reading as if the input had ended. */
	signal?: AbortSignal;
};

/**
 * Stream local input to the session one line at a time.
 *
 * Each line is written and flushed before the next one is read. The first
 * failure ends the loop; nothing is retried. The session is closed on every
 * exit path.
 */
export async function transmit(
	input: NodeJS.ReadableStream,
	session: LineSession,
	options: TransmitOptions = {},
): Promise<TransmitResult> {
	const logger = getChildLogger({ module: "transmit" });
	const reader = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false });
	const onAbort = () => reader.close();
	options.signal?.addEventListener("abort", onAbort, { once: true });

	let linesSent = 0;
	try {
		if (!options.signal?.aborted) {
			for await (const line of reader) {
				await session.writeLine(line);
				linesSent++;
			}
		}
		logger.debug({ linesSent }, "input ended");
		return { linesSent, error: null };
	} catch (err) {
		const error =
			err instanceof TransmissionIOError
				? err
				: new TransmissionIOError(`Reading input failed: ${formatErrorSafe(err)}`, "read", {
						cause: err,
					});
		logger.warn({ linesSent, direction: error.direction, error: error.message }, "transmission stopped");
		return { linesSent, error };
	} finally {
		options.signal?.removeEventListener("abort", onAbort);
		reader.close();
		session.close();
	}
}
