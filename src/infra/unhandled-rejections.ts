/**
 * Process-level unhandled rejection handler.
 *
 * Every expected failure of a client run is caught and reported by the run
 * itself; anything that still reaches here is logged, reported once to the
 * operator and turned into a non-zero exit code instead of a stack dump.
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isConnectionResetError } from "./network-errors.js";

export type RejectionCategory = "abort" | "connection" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isConnectionResetError(err)) return "connection";
	return "unknown";
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(report: (message: string) => void): void {
	const logger = getChildLogger({ module: "unhandled-rejections" });

	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				// Expected on interrupt
				logger.debug(`suppressed abort rejection: ${formatted}`);
				break;

			case "connection":
				logger.warn({ category }, `connection dropped outside a run step: ${formatted}`);
				report(`Connection lost: ${formatted}`);
				process.exitCode = 1;
				break;

			default:
				logger.error({ category }, `unhandled rejection: ${formatted}`);
				report(`Error: ${formatted}`);
				process.exitCode = 1;
				break;
		}
	});

	logger.debug("unhandled rejection handler installed");
}
