/**
 * ANSI color helpers. Pass-through when NO_COLOR is set or the stream is not a TTY.
 */

const enabled = !process.env['NO_COLOR'] && !!process.stderr.isTTY && !!process.stdout.isTTY;

function wrap(open: number, close: number) {
  return (s: string): string =>
    enabled ? `\u001b[${open}m${s}\u001b[${close}m` : s;
}

export const dim = wrap(2, 22);
export const yellow = wrap(33, 39);
export const red = wrap(31, 39);
