/**
 * String view literals.
 *
 * ```typescript
 * const name = sv`tinystd`;   // StringView
 * const wide = wsv`größe`;    // WStringView
 * ```
 *
 * Every call site encodes once: the buffer is cached against the template
 * strings object, which the runtime reuses for the same site, so a literal
 * view's storage lives as long as the program. Substitutions do not
 * type-check.
 *
 * Every view from one call site shares that buffer, so it is read-only by
 * contract: never write through `data().source` or `units()` of a literal.
 */

import { char16Traits, char32Traits, charTraits, wcharTraits } from "./char-traits.js";
import type { CharArray, CharTraits } from "./char-traits.js";
import { BasicStringView } from "./string-view.js";

/** Returns views over an interned buffer that callers must not modify. */
export type LiteralTag<C extends CharArray> = (strings: TemplateStringsArray) => BasicStringView<C>;

function literalTag<C extends CharArray>(traits: CharTraits<C>): LiteralTag<C> {
  const interned = new WeakMap<TemplateStringsArray, C>();
  return (strings) => {
    if (strings.length !== 1) {
      throw new TypeError(`${traits.name} string view literals take no substitutions`);
    }
    let buffer = interned.get(strings);
    if (buffer === undefined) {
      buffer = traits.encode(strings[0]);
      interned.set(strings, buffer);
    }
    return BasicStringView.fromArray(traits, buffer);
  };
}

export const sv: LiteralTag<Uint8Array> = literalTag(charTraits);
export const u16sv: LiteralTag<Uint16Array> = literalTag(char16Traits);
export const u32sv: LiteralTag<Uint32Array> = literalTag(char32Traits);
export const wsv: LiteralTag<Uint32Array> = literalTag(wcharTraits);
