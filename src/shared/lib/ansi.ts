/**
 * Tiny ANSI color helper. Respects NO_COLOR env and non-TTY output.
 * All functions are pass-through when color is disabled.
 */

let enabled = !process.env['NO_COLOR'] && !!process.stdout.isTTY;

/** Force color on or off (the runner turns it off when writing JSON). */
export function setColorEnabled(value: boolean): void {
  enabled = value;
}

function wrap(open: number, close: number) {
  return (s: string): string =>
    enabled ? `\u001b[${open}m${s}\u001b[${close}m` : s;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);
export const green = wrap(32, 39);
export const yellow = wrap(33, 39);
export const red = wrap(31, 39);
