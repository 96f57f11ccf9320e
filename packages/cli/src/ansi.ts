/**
 * ANSI color helpers for command output.
 */

const ESC = "\x1b[";

function wrap(code: number, close: number): (s: string) => string {
	return (s) => `${ESC}${code}m${s}${ESC}${close}m`;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);
export const red = wrap(31, 39);
export const green = wrap(32, 39);
export const yellow = wrap(33, 39);
export const cyan = wrap(36, 39);
export const gray = wrap(90, 39);

const ANSI_RE = /\x1b\[[0-9;]*m/g;

/**
 * Remove all ANSI escape sequences from a string.
 */
export function stripAnsi(s: string): string {
	return s.replace(ANSI_RE, "");
}
