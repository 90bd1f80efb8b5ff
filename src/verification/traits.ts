import type {
  Comparable,
  Equatable,
  EqualityTraits,
  OrderingTraits,
} from './types.js';

interface HasEquals {
  equals(other: unknown): boolean;
}

function hasEquals(value: unknown): value is HasEquals {
  return typeof value === 'object'
    && value !== null
    && typeof Reflect.get(value, 'equals') === 'function';
}

/**
 * Default equality for identifiers and attributes: absent values are equal
 * to each other, values with an `equals` method decide for themselves, and
 * everything else is compared by identity (`NaN` equals itself).
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  const aAbsent = a === null || a === undefined;
  const bAbsent = b === null || b === undefined;
  if (aAbsent || bAbsent) return aAbsent && bAbsent;
  if (hasEquals(a)) return a.equals(b);
  return a === b || Object.is(a, b);
}

export function equatableTraits<T extends Equatable>(): EqualityTraits<T> {
  return {
    equals: (a, b) => a.equals(b),
    hash: value => value.hashCode(),
    toString: value => String(value),
  };
}

/**
 * Traits for classes with a `compareTo` method. `equals` falls back to
 * `valueEquals`, so an `Equatable` class is compared with its own `equals`.
 */
export function comparableTraits<T extends Comparable<T>>(): OrderingTraits<T> {
  return {
    compare: (a, b) => a.compareTo(b),
    equals: (a, b) => valueEquals(a, b),
  };
}
