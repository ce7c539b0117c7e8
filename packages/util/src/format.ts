/**
 * printf-style formatting through sprintf-js.
 *
 * Conversions: `%d` `%i` `%u` `%f` `%e` `%g` `%x` `%X` `%o` `%b` `%c` `%s`
 * `%j` and `%%`, with flags, width and precision (`%05d`, `%-8s`, `%.2f`).
 * An unknown conversion throws a SyntaxError.
 */

import sprintfJs from "sprintf-js";

/** Format `args` into `fmt` and return the resulting string. */
export function vasprintf(fmt: string, args: readonly unknown[]): string {
  return sprintfJs.vsprintf(fmt, [...args]);
}

export function asprintf(fmt: string, ...args: unknown[]): string {
  return vasprintf(fmt, args);
}

/**
 * Like printf, but writes to stderr.
 *
 * @returns the number of bytes written
 */
export function eprintf(fmt: string, ...args: unknown[]): number {
  const text = vasprintf(fmt, args);
  process.stderr.write(text);
  return Buffer.byteLength(text);
}
