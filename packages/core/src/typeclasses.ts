/**
 * Eq and Ord
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Antisymmetry: `compare(x, y) === -compare(y, x)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 */

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// Ord
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Clamp any three-way result to an Ordering.
 */
export function toOrdering(n: number): Ordering {
  return n < 0 ? LT : n > 0 ? GT : EQ_ORD;
}

/**
 * Derive a full Ord instance from a single three-way comparison.
 */
export function makeOrd<A>(compare: (a: A, b: A) => number): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === 0,
    notEquals: (a, b) => compare(a, b) !== 0,
    compare: (a, b) => toOrdering(compare(a, b)),
    lessThan: (a, b) => compare(a, b) < 0,
    lessThanOrEqual: (a, b) => compare(a, b) <= 0,
    greaterThan: (a, b) => compare(a, b) > 0,
    greaterThanOrEqual: (a, b) => compare(a, b) >= 0,
  };
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

/**
 * Sorted copy of `items` under `O`.
 */
export function sortWith<A>(O: Ord<A>, items: Iterable<A>): A[] {
  return [...items].sort((a, b) => O.compare(a, b));
}

export function max<A>(O: Ord<A>, a: A, b: A): A {
  return O.greaterThanOrEqual(a, b) ? a : b;
}

export function min<A>(O: Ord<A>, a: A, b: A): A {
  return O.lessThanOrEqual(a, b) ? a : b;
}
