import { precondition } from "@tinystd/core";

const ZERO = 0x30;
const NINE = 0x39;

/**
 * Converts a decimal digit to its value: `'0'..'9'` → `0..9`.
 * Accepts a code unit or a one-character string; anything else is a caller
 * error (checked mode throws PreconditionError).
 */
export function charToInt(ch: number | string): number {
  const code = typeof ch === "string" ? ch.charCodeAt(0) : ch;
  precondition(() => code >= ZERO && code <= NINE, "charToInt expects a decimal digit");
  return code - ZERO;
}
