/**
 * Explicit optional values
 *
 * "Unset" is its own state so that `false`, `0` and `''` are never mistaken
 * for a missing value while cascading defaults.
 */

export type Maybe<T> = { readonly kind: 'set'; readonly value: T } | { readonly kind: 'unset' };

export const UNSET: Maybe<never> = { kind: 'unset' };

export function some<T>(value: T): Maybe<T> {
  return { kind: 'set', value };
}

/**
 * `null` and `undefined` become unset; every other value is set
 */
export function fromNullable<T>(value: T | null | undefined): Maybe<T> {
  return value === null || value === undefined ? UNSET : some(value);
}

function isSet<T>(maybe: Maybe<T>): maybe is { readonly kind: 'set'; readonly value: T } {
  return maybe.kind === 'set';
}

/**
 * Index and value of the first set source, or `null` when all are unset
 */
export function firstSet<T>(
  sources: readonly Maybe<T>[]
): { readonly index: number; readonly value: T } | null {
  for (const [index, source] of sources.entries()) {
    if (isSet(source)) {
      return { index, value: source.value };
    }
  }
  return null;
}
