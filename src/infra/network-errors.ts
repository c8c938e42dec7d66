/**
 * Error classification for socket and TLS failures.
 *
 * Provides BFS traversal through error cause chains so a wrapped error
 * (HandshakeError around a node:tls error, say) still classifies by its root.
 */

/** Error codes that mean the peer or the OS tore the connection down. */
const CONNECTION_RESET_CODES = new Set([
	"ECONNRESET",
	"ECONNABORTED",
	"EPIPE",
	"ERR_STREAM_DESTROYED",
	"ERR_STREAM_WRITE_AFTER_END",
	"ERR_SOCKET_CLOSED",
]);

/** Error codes node:tls reports when the server chain is not trusted. */
const TRUST_FAILURE_CODES = new Set([
	"UNABLE_TO_VERIFY_LEAF_SIGNATURE",
	"UNABLE_TO_GET_ISSUER_CERT",
	"UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
	"SELF_SIGNED_CERT_IN_CHAIN",
	"DEPTH_ZERO_SELF_SIGNED_CERT",
	"CERT_HAS_EXPIRED",
	"CERT_NOT_YET_VALID",
	"CERT_UNTRUSTED",
	"ERR_TLS_CERT_ALTNAME_INVALID",
]);

const UNREACHABLE_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH", "ENETUNREACH", "ETIMEDOUT"]);

/** Error messages (substrings) that indicate the connection went away. */
const RESET_MESSAGE_PATTERNS = [
	"socket hang up",
	"other side closed",
	"write epipe",
	"read econnreset",
	"client network socket disconnected",
];

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.errors` to find all relevant error objects.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;

		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("reason" in val && val.reason != null) {
			queue.push({ value: val.reason, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

function errorCodes(err: unknown): string[] {
	const codes: string[] = [];
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null && "code" in candidate) {
			if (typeof candidate.code === "string") codes.push(candidate.code);
		}
	}
	return codes;
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (val instanceof Error) return val.message;
	if (typeof val === "object" && val !== null && "message" in val) {
		if (typeof val.message === "string") return val.message;
	}
	return null;
}

/**
 * Check if an error (or any error in its cause chain) means the connection was reset or closed.
 */
export function isConnectionResetError(err: unknown): boolean {
	if (errorCodes(err).some((code) => CONNECTION_RESET_CODES.has(code))) return true;

	return collectErrorCandidates(err).some((candidate) => {
		const message = extractMessage(candidate)?.toLowerCase();
		return message !== undefined && RESET_MESSAGE_PATTERNS.some((p) => message.includes(p));
	});
}

/**
 * Check if an error is node:tls rejecting the server certificate chain.
 */
export function isTrustFailure(err: unknown): boolean {
	return errorCodes(err).some((code) => TRUST_FAILURE_CODES.has(code));
}

/**
 * Check if an error is an AbortError (expected on interrupt).
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if ("name" in candidate && candidate.name === "AbortError") return true;
			if ("code" in candidate && candidate.code === "ABORT_ERR") return true;
		}
	}
	return false;
}

/**
 * One-phrase operator hint for a failed connection attempt, or null when nothing specific applies.
 */
export function describeConnectFailure(err: unknown): string | null {
	if (isTrustFailure(err)) return "server certificate is not trusted";
	const codes = errorCodes(err);
	if (codes.some((code) => UNREACHABLE_CODES.has(code))) return "server is unreachable";
	if (isConnectionResetError(err)) return "server closed the connection";
	return null;
}

/**
 * Safely format an error to a string, avoiding circular references.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(msg, maxLength);
		}
		return truncate(String(err), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
