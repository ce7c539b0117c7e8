/**
 * BasicString<C>, an owning, growable, terminated code-unit buffer.
 *
 * The buffer always holds a terminator at `size()`. Growing past the capacity
 * moves the content into a new buffer; views borrowed before that keep the
 * old buffer. Writes within capacity (`clear`, `assign`, `append`) happen in
 * place and show through earlier views. Either way, a view borrowed from an
 * owner is only meaningful until the owner is next modified.
 */

import { createLogger, InvariantError, OutOfRangeError, precondition } from "@tinystd/core";
import { Cursor } from "@tinystd/util";
import type { CharArray, CharPointer, CharTraits } from "./char-traits.js";
import { BasicStringView } from "./string-view.js";

const log = createLogger("string");

export class BasicString<C extends CharArray> implements Iterable<number> {
  private _buffer: C;
  private _size = 0;

  constructor(
    readonly traits: CharTraits<C>,
    capacity: number = 0
  ) {
    this._buffer = traits.allocate(capacity + 1);
  }

  static from<C extends CharArray>(traits: CharTraits<C>, text: string): BasicString<C> {
    const units = traits.encode(text);
    const owned = new BasicString(traits, 0);
    owned._buffer = units;
    owned._size = units.length - 1;
    return owned;
  }

  static fromView<C extends CharArray>(view: BasicStringView<C>): BasicString<C> {
    const owned = new BasicString(view.traits, view.size());
    owned.appendUnits(view.units());
    return owned;
  }

  // ==========================================================================
  // Capacity
  // ==========================================================================

  size(): number {
    return this._size;
  }

  get length(): number {
    return this._size;
  }

  /** Code units that fit without reallocating, terminator excluded. */
  capacity(): number {
    return this._buffer.length - 1;
  }

  empty(): boolean {
    return this._size === 0;
  }

  reserve(capacity: number): void {
    if (capacity <= this.capacity()) return;
    log.debug(`${this.traits.name}: growing ${this.capacity()} -> ${capacity}`);
    const next = this.traits.allocate(capacity + 1);
    next.set(this.traits.slice(this._buffer, 0, this._size + 1));
    this._buffer = next;
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  /** Unchecked: `get(size())` is the terminator. */
  get(position: number): number {
    precondition(() => position >= 0 && position <= this._size, "string index out of range");
    return this._buffer[position];
  }

  at(position: number): number {
    if (position < 0 || position > this._size) {
      throw new OutOfRangeError(position, this._size);
    }
    return this._buffer[position];
  }

  data(): CharPointer<C> {
    return new Cursor(this._buffer, 0);
  }

  /** Borrows the current content. */
  view(): BasicStringView<C> {
    return new BasicStringView(this.traits, this.data(), this._size);
  }

  *[Symbol.iterator](): IterableIterator<number> {
    for (let i = 0; i < this._size; i++) yield this._buffer[i];
  }

  // ==========================================================================
  // Modification
  // ==========================================================================

  append(content: string | BasicStringView<C> | number): this {
    if (typeof content === "number") {
      this.push(content);
    } else if (typeof content === "string") {
      const units = this.traits.encode(content);
      this.appendUnits(this.traits.slice(units, 0, units.length - 1));
    } else {
      this.appendUnits(content.units());
    }
    return this;
  }

  /** Appends one code unit: an integer in `1 .. 2 ** width - 1`. */
  push(unit: number): void {
    if (unit === 0) {
      throw new InvariantError(`${this.traits.name}: cannot append a terminator`);
    }
    const { name, width } = this.traits;
    if (!Number.isInteger(unit) || unit < 0 || unit > 2 ** width - 1) {
      throw new InvariantError(`${name}: code unit ${unit} does not fit ${width} bits`);
    }
    this.appendUnits([unit]);
  }

  assign(content: string | BasicStringView<C>): this {
    // Copy out first: `content` may be a view of this buffer.
    const units =
      typeof content === "string"
        ? this.traits.encode(content)
        : BasicString.fromView(content)._buffer;
    this.clear();
    this.appendUnits(this.traits.slice(units, 0, units.length - 1));
    return this;
  }

  clear(): void {
    this._size = 0;
    this._buffer.set([0], 0);
  }

  toString(): string {
    return this.traits.decode(this._buffer, 0, this._size);
  }

  private appendUnits(units: ArrayLike<number>): void {
    const needed = this._size + units.length;
    if (needed > this.capacity()) {
      this.reserve(Math.max(needed, this.capacity() * 2));
    }
    this._buffer.set(units, this._size);
    this._size = needed;
    this._buffer.set([0], this._size);
  }
}
