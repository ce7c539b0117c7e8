import type { CharArray } from "./char-traits.js";
import type { BasicStringView } from "./string-view.js";

/** Anything with a `write(chunk)` method; a Node `Writable` qualifies. */
export interface CodeUnitSink<C extends CharArray> {
  write(chunk: C): unknown;
}

/**
 * Writes exactly the viewed code units to `sink`. The chunk shares memory with
 * the viewed buffer; the terminator is not written.
 */
export function writeView<C extends CharArray, S extends CodeUnitSink<C>>(
  sink: S,
  view: BasicStringView<C>
): S {
  sink.write(view.units());
  return sink;
}
