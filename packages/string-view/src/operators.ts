/**
 * Free comparison operators.
 *
 * Each accepts a view on either side, paired with another view, an owning
 * BasicString or a raw pointer, and routes through `BasicStringView#compare`.
 */

import { makeOrd, unreachable, type Ord } from "@tinystd/core";
import type { BasicString } from "./basic-string.js";
import type { CharArray, CharPointer } from "./char-traits.js";
import { BasicStringView } from "./string-view.js";

export type Comparand<C extends CharArray> = BasicStringView<C> | BasicString<C> | CharPointer<C>;

function threeWay<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): number {
  if (x instanceof BasicStringView) return x.compare(y);
  if (y instanceof BasicStringView) return -y.compare(x);
  return unreachable();
}

// ============================================================================
// Equality
// ============================================================================

export function equals<C extends CharArray>(x: BasicStringView<C>, y: Comparand<C>): boolean;
export function equals<C extends CharArray>(x: Comparand<C>, y: BasicStringView<C>): boolean;
export function equals<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): boolean {
  return threeWay(x, y) === 0;
}

export function notEquals<C extends CharArray>(x: BasicStringView<C>, y: Comparand<C>): boolean;
export function notEquals<C extends CharArray>(x: Comparand<C>, y: BasicStringView<C>): boolean;
export function notEquals<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): boolean {
  return threeWay(x, y) !== 0;
}

// ============================================================================
// Ordering
// ============================================================================

export function lessThan<C extends CharArray>(x: BasicStringView<C>, y: Comparand<C>): boolean;
export function lessThan<C extends CharArray>(x: Comparand<C>, y: BasicStringView<C>): boolean;
export function lessThan<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): boolean {
  return threeWay(x, y) < 0;
}

export function lessThanOrEqual<C extends CharArray>(
  x: BasicStringView<C>,
  y: Comparand<C>
): boolean;
export function lessThanOrEqual<C extends CharArray>(
  x: Comparand<C>,
  y: BasicStringView<C>
): boolean;
export function lessThanOrEqual<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): boolean {
  return threeWay(x, y) <= 0;
}

export function greaterThan<C extends CharArray>(x: BasicStringView<C>, y: Comparand<C>): boolean;
export function greaterThan<C extends CharArray>(x: Comparand<C>, y: BasicStringView<C>): boolean;
export function greaterThan<C extends CharArray>(x: Comparand<C>, y: Comparand<C>): boolean {
  return threeWay(x, y) > 0;
}

export function greaterThanOrEqual<C extends CharArray>(
  x: BasicStringView<C>,
  y: Comparand<C>
): boolean;
export function greaterThanOrEqual<C extends CharArray>(
  x: Comparand<C>,
  y: BasicStringView<C>
): boolean;
export function greaterThanOrEqual<C extends CharArray>(
  x: Comparand<C>,
  y: Comparand<C>
): boolean {
  return threeWay(x, y) >= 0;
}

// ============================================================================
// Instances
// ============================================================================

/**
 * Ord instance for views of one width, for typeclass-based code such as
 * `sortWith(ordStringView(), views)`.
 */
export function ordStringView<C extends CharArray>(): Ord<BasicStringView<C>> {
  return makeOrd<BasicStringView<C>>((a, b) => a.compare(b));
}

/** Exchanges the contents of two views. */
export function swap<C extends CharArray>(a: BasicStringView<C>, b: BasicStringView<C>): void {
  a.swap(b);
}
