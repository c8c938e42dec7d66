let verbose = false;

export function setVerbose(value: boolean): void {
	verbose = value;
}

export function isVerbose(): boolean {
	return verbose;
}
