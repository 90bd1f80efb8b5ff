/**
 * Contract Verification Types
 *
 * Checks, their outcomes, and the accessor callbacks ("traits") through
 * which the checkers reach the otherwise opaque values under test.
 */

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

export interface CheckOutcome {
  passed: boolean;
  /** Why the item did not match; present only on failure. */
  mismatch?: string;
  /** Value thrown by an accessor or predicate during evaluation. */
  cause?: unknown;
}

/**
 * A predicate over one item, with a description of what it expects that is
 * only rendered when a failure is reported.
 */
export interface Check<T> {
  describe(): string;
  evaluate(item: T): CheckOutcome;
}

export type Describer = string | (() => string);

/** Caller-supplied function from an object to a derived value. May throw. */
export type Accessor<T, U> = (item: T) => U;

export type Verifier<T> = (item: T) => void;

export type Operation = () => void;

// ---------------------------------------------------------------------------
// Traits
// ---------------------------------------------------------------------------

export interface EqualityTraits<T> {
  /** `b` is `null` when checking equality with "nothing". */
  equals(a: T, b: T | null): boolean;
  hash(value: T): number;
  toString?(value: T): string;
}

export interface OrderingTraits<T> {
  /** Must raise the invalid-comparison signal when `b` is `null`. */
  compare(a: T, b: T | null): number;
  equals?(a: T, b: T): boolean;
  /** Recognises the invalid-comparison signal. Defaults to `TypeError`. */
  isInvalidComparison?(error: unknown): boolean;
}

export type ValueEquality<U> = (a: U, b: U) => boolean;

// ---------------------------------------------------------------------------
// Protocols for classes that carry their own equality and ordering
// ---------------------------------------------------------------------------

export interface Equatable {
  equals(other: unknown): boolean;
  hashCode(): number;
}

export interface Comparable<T> {
  compareTo(other: T | null): number;
}
