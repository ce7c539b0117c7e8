/**
 * Random-access read cursors.
 *
 * A Cursor is a position inside an array-like: the source plus an index. It is
 * the library's stand-in for a raw pointer: arithmetic moves the index and
 * never copies the source. Cursors only read.
 *
 * Past-the-end cursors (`end()`, `rend()`) mark a boundary and must not be
 * dereferenced; in checked mode reading outside the source throws.
 */

import { precondition } from "@tinystd/core";

export type Source = ArrayLike<unknown>;

function inBounds(source: Source, index: number): boolean {
  return index >= 0 && index < source.length;
}

export class Cursor<S extends Source> {
  constructor(
    readonly source: S,
    readonly index: number = 0
  ) {}

  /** The element `offset` places from this cursor. */
  get(offset: number = 0): S[number] {
    const at = this.index + offset;
    precondition(() => inBounds(this.source, at), "cursor read outside its source");
    return this.source[at];
  }

  add(n: number): Cursor<S> {
    return new Cursor(this.source, this.index + n);
  }

  next(): Cursor<S> {
    return this.add(1);
  }

  prev(): Cursor<S> {
    return this.add(-1);
  }

  /** Number of steps from this cursor to `other` (`other - this`). */
  distance(other: Cursor<S>): number {
    precondition(() => other.source === this.source, "distance between cursors of different sources");
    return other.index - this.index;
  }

  equals(other: Cursor<S>): boolean {
    return this.source === other.source && this.index === other.index;
  }

  /** Elements in `[this, last)`. */
  collectTo(last: Cursor<S>): Array<S[number]> {
    const out: Array<S[number]> = [];
    for (let i = 0, n = this.distance(last); i < n; i++) out.push(this.get(i));
    return out;
  }
}

/**
 * Walks a source backwards. Dereferencing reads the element just before the
 * base cursor, so `new ReverseCursor(end)` reads the last element.
 */
export class ReverseCursor<S extends Source> {
  constructor(readonly base: Cursor<S>) {}

  get(offset: number = 0): S[number] {
    return this.base.get(-1 - offset);
  }

  add(n: number): ReverseCursor<S> {
    return new ReverseCursor(this.base.add(-n));
  }

  next(): ReverseCursor<S> {
    return this.add(1);
  }

  prev(): ReverseCursor<S> {
    return this.add(-1);
  }

  distance(other: ReverseCursor<S>): number {
    return other.base.distance(this.base);
  }

  equals(other: ReverseCursor<S>): boolean {
    return this.base.equals(other.base);
  }

  collectTo(last: ReverseCursor<S>): Array<S[number]> {
    const out: Array<S[number]> = [];
    for (let i = 0, n = this.distance(last); i < n; i++) out.push(this.get(i));
    return out;
  }
}
