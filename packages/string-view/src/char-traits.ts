/**
 * Character Traits
 *
 * A traits object is the policy a string view is generic over: how long a
 * terminated sequence is, how two runs of code units compare, and how a JS
 * string maps to and from code units of one width.
 *
 * | traits         | buffer        | encoding            |
 * | -------------- | ------------- | ------------------- |
 * | `charTraits`   | `Uint8Array`  | UTF-8               |
 * | `char16Traits` | `Uint16Array` | UTF-16 code units   |
 * | `char32Traits` | `Uint32Array` | Unicode code points |
 * | `wcharTraits`  | `Uint32Array` | Unicode code points |
 *
 * Code units are unsigned, so ordering is by unsigned value.
 */

import { InvariantError, precondition, type Ordering } from "@tinystd/core";
import type { Cursor } from "@tinystd/util";

export type CharArray = Uint8Array | Uint16Array | Uint32Array;

/** A raw pointer: a buffer plus the index of the first code unit. */
export type CharPointer<C extends CharArray> = Cursor<C>;

export interface CharTraits<C extends CharArray> {
  readonly name: string;
  /** Bits per code unit. */
  readonly width: 8 | 16 | 32;
  /**
   * Shared terminator-only buffer that empty views point at. Every default
   * view reaches it through `data().source`; callers must never write to it.
   */
  readonly empty: C;

  /** Code units before the first terminator at or after `pointer`. */
  length(pointer: CharPointer<C>): number;
  /** Three-way comparison of `count` code units starting at each pointer. */
  compare(p1: CharPointer<C>, p2: CharPointer<C>, count: number): Ordering;
  eq(a: number, b: number): boolean;
  lt(a: number, b: number): boolean;

  /** A zero-filled buffer of `size` code units. */
  allocate(size: number): C;
  /** A window `[begin, end)` onto `buffer`, sharing its memory. */
  slice(buffer: C, begin: number, end: number): C;
  /** Encodes `text` followed by a terminator. */
  encode(text: string): C;
  decode(buffer: C, begin: number, end: number): string;
}

// ============================================================================
// Shared operations
// ============================================================================

const TERMINATOR = 0;

function scanLength(source: CharArray, index: number): number {
  let i = index;
  while (i < source.length && source[i] !== TERMINATOR) i++;
  precondition(() => i < source.length, "character sequence has no terminator");
  return i - index;
}

function compareUnits(a: CharArray, ai: number, b: CharArray, bi: number, count: number): Ordering {
  for (let k = 0; k < count; k++) {
    const x = a[ai + k];
    const y = b[bi + k];
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

function rejectTerminator(units: ArrayLike<number>, traitsName: string): void {
  for (let i = 0; i < units.length; i++) {
    if (units[i] === TERMINATOR) {
      throw new InvariantError(`${traitsName}: text contains a terminator at index ${i}`);
    }
  }
}

interface Codec<C extends CharArray> {
  name: string;
  width: 8 | 16 | 32;
  allocate(size: number): C;
  slice(buffer: C, begin: number, end: number): C;
  toUnits(text: string): ArrayLike<number>;
  fromUnits(units: C): string;
}

function makeCharTraits<C extends CharArray>(codec: Codec<C>): CharTraits<C> {
  return {
    name: codec.name,
    width: codec.width,
    empty: codec.allocate(1),
    length: (pointer) => scanLength(pointer.source, pointer.index),
    compare: (p1, p2, count) => compareUnits(p1.source, p1.index, p2.source, p2.index, count),
    eq: (a, b) => a === b,
    lt: (a, b) => a < b,
    allocate: codec.allocate,
    slice: codec.slice,
    encode: (text) => {
      const units = codec.toUnits(text);
      rejectTerminator(units, codec.name);
      const buffer = codec.allocate(units.length + 1);
      buffer.set(units);
      return buffer;
    },
    decode: (buffer, begin, end) => codec.fromUnits(codec.slice(buffer, begin, end)),
  };
}

// ============================================================================
// Encodings
// ============================================================================

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

// String.fromCharCode / fromCodePoint take their input as arguments.
const DECODE_CHUNK = 0x2000;

function decodeChunked(units: ArrayLike<number>, decode: (chunk: number[]) => string): string {
  let out = "";
  for (let i = 0; i < units.length; i += DECODE_CHUNK) {
    const chunk: number[] = [];
    for (let k = i; k < Math.min(i + DECODE_CHUNK, units.length); k++) chunk.push(units[k]);
    out += decode(chunk);
  }
  return out;
}

/** Values above U+10FFFF decode as U+FFFD. */
function fromCodePoints(chunk: number[]): string {
  return String.fromCodePoint(...chunk.map((point) => (point > 0x10ffff ? 0xfffd : point)));
}

function utf16Units(text: string): number[] {
  const units: number[] = [];
  for (let i = 0; i < text.length; i++) units.push(text.charCodeAt(i));
  return units;
}

function codePoints(text: string): number[] {
  const points: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const high = text.charCodeAt(i);
    if (high >= 0xd800 && high <= 0xdbff && i + 1 < text.length) {
      const low = text.charCodeAt(i + 1);
      if (low >= 0xdc00 && low <= 0xdfff) {
        points.push((high - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000);
        i++;
        continue;
      }
    }
    points.push(high);
  }
  return points;
}

export const charTraits: CharTraits<Uint8Array> = makeCharTraits<Uint8Array>({
  name: "char",
  width: 8,
  allocate: (size) => new Uint8Array(size),
  slice: (buffer, begin, end) => buffer.subarray(begin, end),
  toUnits: (text) => utf8Encoder.encode(text),
  fromUnits: (units) => utf8Decoder.decode(units),
});

export const char16Traits: CharTraits<Uint16Array> = makeCharTraits<Uint16Array>({
  name: "char16",
  width: 16,
  allocate: (size) => new Uint16Array(size),
  slice: (buffer, begin, end) => buffer.subarray(begin, end),
  toUnits: utf16Units,
  fromUnits: (units) => decodeChunked(units, (chunk) => String.fromCharCode(...chunk)),
});

export const char32Traits: CharTraits<Uint32Array> = makeCharTraits<Uint32Array>({
  name: "char32",
  width: 32,
  allocate: (size) => new Uint32Array(size),
  slice: (buffer, begin, end) => buffer.subarray(begin, end),
  toUnits: codePoints,
  fromUnits: (units) => decodeChunked(units, fromCodePoints),
});

/** Wide characters are 32-bit code points. */
export const wcharTraits: CharTraits<Uint32Array> = makeCharTraits<Uint32Array>({
  name: "wchar",
  width: 32,
  allocate: (size) => new Uint32Array(size),
  slice: (buffer, begin, end) => buffer.subarray(begin, end),
  toUnits: codePoints,
  fromUnits: (units) => decodeChunked(units, fromCodePoints),
});
