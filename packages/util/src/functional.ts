/**
 * Small call helpers: per-argument iteration and promise continuation.
 */

/**
 * Calls `callable` with every argument, one after the other.
 *
 * @example
 * ```typescript
 * forEachArgument((e) => out.push(String(e)), 1, 2.1, "hello", 44n);
 * ```
 */
export function forEachArgument<Args extends readonly unknown[]>(
  callable: (arg: Args[number], index: number) => void,
  ...args: Args
): void {
  args.forEach((arg, index) => callable(arg, index));
}

/**
 * Continues a future with a continuation. The continuation receives the
 * fulfilled value (nothing for `Promise<void>`) and the returned promise
 * settles with its result. A rejected future skips the continuation and
 * rejects the result with the same reason.
 */
export function continueWith<T, R>(
  future: PromiseLike<T>,
  continuation: (value: T) => R | PromiseLike<R>
): Promise<Awaited<R>> {
  return Promise.resolve(future.then(continuation));
}
