/**
 * Per-width aliases.
 *
 * Each name is both a type (`BasicStringView` of that width) and a factory
 * bundling the constructors with the traits filled in:
 *
 * ```typescript
 * const owner = BasicString.from(charTraits, "abc");
 * const a: StringView = StringView.borrow(owner);
 * const b: StringView = StringView.fromArray(charTraits.encode("abd"));
 * const c: U16StringView = U16StringView.from("wide");
 * ```
 */

import type { BasicString } from "./basic-string.js";
import {
  char16Traits,
  char32Traits,
  charTraits,
  wcharTraits,
  type CharArray,
  type CharPointer,
  type CharTraits,
} from "./char-traits.js";
import { BasicStringView } from "./string-view.js";

export interface StringViewFactory<C extends CharArray> {
  readonly traits: CharTraits<C>;
  empty(): BasicStringView<C>;
  fromPointer(pointer: CharPointer<C>): BasicStringView<C>;
  fromArray(array: C): BasicStringView<C>;
  of(pointer: CharPointer<C>, size: number): BasicStringView<C>;
  borrow(owner: BasicString<C>): BasicStringView<C>;
  /** Encodes `text` into a fresh buffer and views it. */
  from(text: string): BasicStringView<C>;
}

function viewFactory<C extends CharArray>(traits: CharTraits<C>): StringViewFactory<C> {
  return {
    traits,
    empty: () => new BasicStringView(traits),
    fromPointer: (pointer) => BasicStringView.fromPointer(traits, pointer),
    fromArray: (array) => BasicStringView.fromArray(traits, array),
    of: (pointer, size) => new BasicStringView(traits, pointer, size),
    borrow: (owner) => BasicStringView.borrow(owner),
    from: (text) => BasicStringView.fromArray(traits, traits.encode(text)),
  };
}

export type StringView = BasicStringView<Uint8Array>;
export const StringView: StringViewFactory<Uint8Array> = viewFactory(charTraits);

export type U16StringView = BasicStringView<Uint16Array>;
export const U16StringView: StringViewFactory<Uint16Array> = viewFactory(char16Traits);

export type U32StringView = BasicStringView<Uint32Array>;
export const U32StringView: StringViewFactory<Uint32Array> = viewFactory(char32Traits);

export type WStringView = BasicStringView<Uint32Array>;
export const WStringView: StringViewFactory<Uint32Array> = viewFactory(wcharTraits);
