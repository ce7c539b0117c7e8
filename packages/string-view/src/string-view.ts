/**
 * BasicStringView<C>, a non-owning view of a terminated code-unit sequence.
 *
 * A view is a pointer (buffer + index) and a size. It never allocates, copies
 * or frees what it looks at, and the code unit at `size()` is always a
 * terminator, so `get(size())` reads `0`.
 *
 * ```typescript
 * const greeting = sv`hello`;
 * greeting.size();                        // 5
 * greeting.startsWith(sv`he`);            // true
 * greeting.compare(sv`help`) < 0;         // true
 *
 * const owner = BasicString.from(charTraits, "some text");
 * const borrowed = owner.view();          // valid until `owner` changes
 * ```
 *
 * There are no implicit conversions: an owner is viewed with `owner.view()`
 * or `BasicStringView.borrow(owner)`, and a raw pointer with
 * `BasicStringView.fromPointer()`.
 *
 * Reading past `size()`, `back()` on an empty view and dereferencing `end()`
 * are caller errors. They go unchecked unless `checks.preconditions` is on.
 */

import { OutOfRangeError, precondition, type Ordering } from "@tinystd/core";
import { Cursor, ReverseCursor } from "@tinystd/util";
import { BasicString } from "./basic-string.js";
import type { CharArray, CharPointer, CharTraits } from "./char-traits.js";

export class BasicStringView<C extends CharArray> implements Iterable<number> {
  private _traits: CharTraits<C>;
  private _data: C;
  private _offset: number;
  private _size: number;

  /** An empty view over the traits' shared empty buffer. */
  constructor(traits: CharTraits<C>);
  /** `size` code units starting at `pointer`; the length is trusted. */
  constructor(traits: CharTraits<C>, pointer: CharPointer<C>, size: number);
  constructor(traits: CharTraits<C>, pointer?: CharPointer<C>, size: number = 0) {
    this._traits = traits;
    if (pointer === undefined) {
      this._data = traits.empty;
      this._offset = 0;
      this._size = 0;
      return;
    }
    const source = pointer.source;
    const offset = pointer.index;
    precondition(
      () => size >= 0 && source[offset + size] === 0,
      "string view length does not end at a terminator"
    );
    this._data = source;
    this._offset = offset;
    this._size = size;
  }

  /** Views a terminated sequence, scanning for its terminator. */
  static fromPointer<C extends CharArray>(
    traits: CharTraits<C>,
    pointer: CharPointer<C>
  ): BasicStringView<C> {
    return new BasicStringView(traits, pointer, traits.length(pointer));
  }

  /**
   * Views a whole terminated array without scanning: the size is
   * `array.length - 1`.
   */
  static fromArray<C extends CharArray>(traits: CharTraits<C>, array: C): BasicStringView<C> {
    precondition(() => array.length > 0, "a terminated array holds at least the terminator");
    return new BasicStringView(traits, new Cursor(array, 0), array.length - 1);
  }

  /** Borrows the owner's buffer at its current size. */
  static borrow<C extends CharArray>(owner: BasicString<C>): BasicStringView<C> {
    return owner.view();
  }

  get traits(): CharTraits<C> {
    return this._traits;
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

  empty(): boolean {
    return this._size === 0;
  }

  // ==========================================================================
  // Element access
  // ==========================================================================

  get(position: number): number {
    precondition(() => position >= 0 && position <= this._size, "string view index out of range");
    return this._data[this._offset + position];
  }

  /**
   * Like `get`, but throws OutOfRangeError past `size()`. Position `size()`
   * reads the terminator.
   */
  at(position: number): number {
    if (position < 0 || position > this._size) {
      throw new OutOfRangeError(position, this._size);
    }
    return this._data[this._offset + position];
  }

  front(): number {
    return this.get(0);
  }

  back(): number {
    precondition(() => this._size > 0, "back() of an empty string view");
    return this.get(this._size - 1);
  }

  data(): CharPointer<C> {
    return new Cursor(this._data, this._offset);
  }

  /** The viewed code units, sharing memory with the underlying buffer. */
  units(): C {
    return this._traits.slice(this._data, this._offset, this._offset + this._size);
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  begin(): CharPointer<C> {
    return this.data();
  }

  /** One past the last code unit. Never dereference. */
  end(): CharPointer<C> {
    return new Cursor(this._data, this._offset + this._size);
  }

  rbegin(): ReverseCursor<C> {
    return new ReverseCursor(this.end());
  }

  rend(): ReverseCursor<C> {
    return new ReverseCursor(this.begin());
  }

  *[Symbol.iterator](): IterableIterator<number> {
    for (let i = 0; i < this._size; i++) yield this._data[this._offset + i];
  }

  *reversed(): IterableIterator<number> {
    for (let i = this._size - 1; i >= 0; i--) yield this._data[this._offset + i];
  }

  // ==========================================================================
  // Modifiers
  // ==========================================================================

  /** Drops the first `n` code units; clamps to `size()`. */
  removePrefix(n: number): void {
    const count = Math.min(Math.max(n, 0), this._size);
    this._offset += count;
    this._size -= count;
  }

  swap(other: BasicStringView<C>): void {
    const traits = this._traits;
    const data = this._data;
    const offset = this._offset;
    const size = this._size;
    this._traits = other._traits;
    this._data = other._data;
    this._offset = other._offset;
    this._size = other._size;
    other._traits = traits;
    other._data = data;
    other._offset = offset;
    other._size = size;
  }

  clone(): BasicStringView<C> {
    return new BasicStringView(this._traits, this.data(), this._size);
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Lexicographic comparison over the shorter length; the shorter view
   * orders first when that prefix is equal. A pointer is viewed up to its
   * terminator.
   */
  compare(other: BasicStringView<C> | BasicString<C> | CharPointer<C>): Ordering {
    const rhs =
      other instanceof BasicStringView
        ? other
        : other instanceof BasicString
          ? other.view()
          : BasicStringView.fromPointer(this._traits, other);
    const result = this._traits.compare(this.data(), rhs.data(), Math.min(this._size, rhs._size));
    if (result !== 0) return result;
    return this._size === rhs._size ? 0 : this._size < rhs._size ? -1 : 1;
  }

  startsWith(prefix: number | BasicStringView<C>): boolean {
    if (typeof prefix === "number") {
      return !this.empty() && this._traits.eq(prefix, this.front());
    }
    return (
      this._size >= prefix._size &&
      this._traits.compare(this.data(), prefix.data(), prefix._size) === 0
    );
  }

  endsWith(suffix: number | BasicStringView<C>): boolean {
    if (typeof suffix === "number") {
      return !this.empty() && this._traits.eq(suffix, this.back());
    }
    return (
      this._size >= suffix._size &&
      this._traits.compare(this.data().add(this._size - suffix._size), suffix.data(), suffix._size) ===
        0
    );
  }

  /** Copies the content into a new owner. */
  toOwned(): BasicString<C> {
    return BasicString.fromView(this);
  }

  toString(): string {
    return this._traits.decode(this._data, this._offset, this._offset + this._size);
  }
}
