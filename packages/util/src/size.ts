/**
 * Element count of any container: a `size()` method (views, owned strings),
 * a `size` property (Map, Set) or a `length` (arrays, typed arrays, strings).
 */
export type Sized = { size(): number } | { readonly size: number } | { readonly length: number };

export function size(container: Sized | string): number {
  if (typeof container === "string") return container.length;
  if ("size" in container) {
    return typeof container.size === "function" ? container.size() : container.size;
  }
  return container.length;
}
