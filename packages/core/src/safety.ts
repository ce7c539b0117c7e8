/**
 * Runtime Safety Primitives
 *
 * - `precondition(check, message)`: caller contract, checked only in checked mode
 * - `invariant(condition, message)`: always-on assertion
 * - `unreachable(value?)`: marks impossible code paths
 *
 * @example
 * ```typescript
 * function back(view: StringView): number {
 *   precondition(() => !view.empty(), "back() on an empty view");
 *   return view.get(view.size() - 1);
 * }
 * ```
 */

import { config } from "./config.js";
import { InvariantError, PreconditionError } from "./errors.js";

/**
 * Whether caller contracts are checked (`checks.preconditions`).
 */
export function preconditionsEnabled(): boolean {
  return config.getBoolean("checks.preconditions", false);
}

/**
 * Check a caller contract. The check runs only in checked mode, so it may be
 * as expensive as a scan; otherwise a violation stays undefined behaviour.
 *
 * @throws PreconditionError if checked mode is on and the check fails
 */
export function precondition(check: () => boolean, message: string): void {
  if (preconditionsEnabled() && !check()) {
    throw new PreconditionError(message);
  }
}

/**
 * Runtime invariant check, independent of checked mode.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 * At runtime, throws if somehow reached.
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}
