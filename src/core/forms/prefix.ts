// src/core/forms/prefix.ts
// Take-if-matches on the first element of a sequence

export type Prefixed<T, E> = [T, readonly E[]];

/**
 * If `sequence` is non-empty and `predicate` holds for its first element,
 * returns `[transform(first), rest]`; otherwise `[dflt, sequence]` with the
 * very same array. Consumes at most one element.
 *
 * @example
 * extractPrefix(forms, (s) => s, isSymbol, undefined)  // optional name
 */
export function extractPrefix<E, N extends E, T, D>(
  sequence: readonly E[],
  transform: (first: N) => T,
  predicate: (first: E) => first is N,
  dflt: D
): Prefixed<T | D, E>;
export function extractPrefix<E, T, D>(
  sequence: readonly E[],
  transform: (first: E) => T,
  predicate: (first: E) => boolean,
  dflt: D
): Prefixed<T | D, E>;
export function extractPrefix<E, T, D>(
  sequence: readonly E[],
  transform: (first: E) => T,
  predicate: (first: E) => boolean,
  dflt: D
): Prefixed<T | D, E> {
  if (sequence.length > 0 && predicate(sequence[0])) {
    return [transform(sequence[0]), sequence.slice(1)];
  }
  return [dflt, sequence];
}
