import os from "node:os";
import path from "node:path";

export const CONFIG_DIR = `${os.homedir()}/.alias-tls`;

/**
 * Expand a leading `~` so store paths from config files behave like shell paths.
 */
export function resolveUserPath(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return path.resolve(p);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
