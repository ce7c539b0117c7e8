/**
 * begin / end helpers for arrays and ranged containers.
 *
 * Containers that expose `begin()`/`end()` (and `rbegin()`/`rend()`) are
 * asked directly; anything array-like gets a Cursor over itself.
 *
 * @example
 * ```typescript
 * function sum(first: Cursor<number[]>, last: Cursor<number[]>): number { ... }
 * sum(...beginEnd([1, 2, 3]));
 * ```
 */

import { Cursor, ReverseCursor, type Source } from "./cursor.js";

export interface Ranged<I> {
  begin(): I;
  end(): I;
}

export interface ReverseRanged<R> {
  rbegin(): R;
  rend(): R;
}

function isRanged<I>(value: unknown): value is Ranged<I> {
  return (
    typeof value === "object" &&
    value !== null &&
    "begin" in value &&
    typeof value.begin === "function" &&
    "end" in value &&
    typeof value.end === "function"
  );
}

function isReverseRanged<R>(value: unknown): value is ReverseRanged<R> {
  return (
    typeof value === "object" &&
    value !== null &&
    "rbegin" in value &&
    typeof value.rbegin === "function" &&
    "rend" in value &&
    typeof value.rend === "function"
  );
}

export function begin<I>(container: Ranged<I>): I;
export function begin<S extends Source>(array: S): Cursor<S>;
export function begin<I, S extends Source>(source: Ranged<I> | S): I | Cursor<S> {
  if (isRanged<I>(source)) return source.begin();
  return new Cursor(source, 0);
}

export function end<I>(container: Ranged<I>): I;
export function end<S extends Source>(array: S): Cursor<S>;
export function end<I, S extends Source>(source: Ranged<I> | S): I | Cursor<S> {
  if (isRanged<I>(source)) return source.end();
  return new Cursor(source, source.length);
}

export function rbegin<R>(container: ReverseRanged<R>): R;
export function rbegin<S extends Source>(array: S): ReverseCursor<S>;
export function rbegin<R, S extends Source>(source: ReverseRanged<R> | S): R | ReverseCursor<S> {
  if (isReverseRanged<R>(source)) return source.rbegin();
  return new ReverseCursor(new Cursor(source, source.length));
}

export function rend<R>(container: ReverseRanged<R>): R;
export function rend<S extends Source>(array: S): ReverseCursor<S>;
export function rend<R, S extends Source>(source: ReverseRanged<R> | S): R | ReverseCursor<S> {
  if (isReverseRanged<R>(source)) return source.rend();
  return new ReverseCursor(new Cursor(source, 0));
}

/** `[begin, end)` as a pair, for spreading into two-argument calls. */
export function beginEnd<I>(container: Ranged<I>): [I, I];
export function beginEnd<S extends Source>(array: S): [Cursor<S>, Cursor<S>];
export function beginEnd<I, S extends Source>(
  source: Ranged<I> | S
): [I, I] | [Cursor<S>, Cursor<S>] {
  if (isRanged<I>(source)) return [source.begin(), source.end()];
  return [new Cursor(source, 0), new Cursor(source, source.length)];
}

/** `[rbegin, rend)` as a pair. */
export function rbeginRend<R>(container: ReverseRanged<R>): [R, R];
export function rbeginRend<S extends Source>(array: S): [ReverseCursor<S>, ReverseCursor<S>];
export function rbeginRend<R, S extends Source>(
  source: ReverseRanged<R> | S
): [R, R] | [ReverseCursor<S>, ReverseCursor<S>] {
  if (isReverseRanged<R>(source)) return [source.rbegin(), source.rend()];
  return [
    new ReverseCursor(new Cursor(source, source.length)),
    new ReverseCursor(new Cursor(source, 0)),
  ];
}

/** Elements of the cursor range `[first, last)`. */
export function toArray<S extends Source>(first: Cursor<S>, last: Cursor<S>): Array<S[number]>;
export function toArray<S extends Source>(
  first: ReverseCursor<S>,
  last: ReverseCursor<S>
): Array<S[number]>;
export function toArray<S extends Source>(
  first: Cursor<S> | ReverseCursor<S>,
  last: Cursor<S> | ReverseCursor<S>
): Array<S[number]> {
  if (first instanceof Cursor && last instanceof Cursor) return first.collectTo(last);
  if (first instanceof ReverseCursor && last instanceof ReverseCursor) return first.collectTo(last);
  throw new TypeError("toArray needs two cursors of the same direction");
}
