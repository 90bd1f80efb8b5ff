/**
 * Identity Contract
 *
 * Invariants every value with an equality relation must satisfy:
 * stringification and hashing do not throw, the value equals itself, it
 * never equals "nothing" (`null`), equality is symmetric, and equal values
 * have equal hashes. The converse of the last (unequal values have different
 * hashes) is not required.
 */

import { requirePresent, isUnrecoverable } from '../core/errors.js';
import { assertAll } from './assert-all.js';
import {
  allOf,
  assertThat,
  createCheck,
  describedAs,
  methodDoesNotThrow,
  pairRelationship,
  selfRelationship,
} from './check.js';
import type { Description } from './description.js';
import { safeHash, safeToString } from './safe.js';
import type { Check, EqualityTraits } from './types.js';

/**
 * Call `traits.equals` directly; `b` may be `null`, which `safeEquals`
 * would short-circuit.
 */
function tryEquals<T>(
  traits: EqualityTraits<T>,
  a: T,
  b: T | null,
  mismatch: Description,
): boolean | undefined {
  try {
    return Boolean(traits.equals(a, b));
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    mismatch.appendClause('but equals() threw exception ').appendThrown(err);
    return undefined;
  }
}

function stringify<T>(traits: EqualityTraits<T>, value: T): string {
  return traits.toString ? traits.toString(value) : String(value);
}

// ---------------------------------------------------------------------------
// Sub-checks
// ---------------------------------------------------------------------------

export function toStringDoesNotThrow<T>(traits: EqualityTraits<T>): Check<T> {
  return methodDoesNotThrow<T>('toString', item => stringify(traits, item));
}

export function hashDoesNotThrow<T>(traits: EqualityTraits<T>): Check<T> {
  return methodDoesNotThrow<T>('hash', item => traits.hash(item));
}

export function equalsSelf<T>(traits: EqualityTraits<T>): Check<T> {
  return selfRelationship<T>('is equivalent to itself', (item, self, mismatch) => {
    const equals = tryEquals(traits, item, self, mismatch);
    if (equals === undefined) return false;
    if (!equals) mismatch.appendClause('not satisfied');
    return equals;
  });
}

export function neverEqualsNothing<T>(traits: EqualityTraits<T>): Check<T> {
  return createCheck<T>('is not equivalent to null', (item, mismatch) => {
    const equals = tryEquals(traits, item, null, mismatch);
    if (equals === undefined) return false;
    if (equals) mismatch.appendClause('not satisfied');
    return !equals;
  });
}

export function equalityIsSymmetric<T>(other: T, traits: EqualityTraits<T>): Check<T> {
  return pairRelationship<T, T>(other, 'equality is symmetric', (a, b, mismatch) => {
    const equals12 = tryEquals(traits, a, b, mismatch);
    const equals21 = tryEquals(traits, b, a, mismatch);
    if (equals12 === undefined || equals21 === undefined) return false;
    if (equals12 !== equals21) {
      mismatch.appendClause(
        `not satisfied: equals(x, other) is ${equals12} but equals(other, x) is ${equals21}`,
      );
      return false;
    }
    return true;
  });
}

export function hashIsConsistentWithEquals<T>(other: T, traits: EqualityTraits<T>): Check<T> {
  const hash = (value: T) => traits.hash(value);
  return pairRelationship<T, T>(other, 'hash is consistent with equals', (a, b, mismatch) => {
    const equals = tryEquals(traits, a, b, mismatch);
    const hash1 = safeHash(hash, a, mismatch);
    const hash2 = safeHash(hash, b, mismatch);
    if (equals === undefined || hash1 === undefined || hash2 === undefined) return false;
    if (equals && hash1 !== hash2) {
      mismatch
        .appendClause('not satisfied: equal values have hashes ')
        .appendValue(hash1)
        .appendText(' and ')
        .appendValue(hash2);
      return false;
    }
    return true;
  });
}

function singleChecks<T>(traits: EqualityTraits<T>): [Check<T>, Check<T>, Check<T>, Check<T>] {
  return [
    toStringDoesNotThrow(traits),
    hashDoesNotThrow(traits),
    equalsSelf(traits),
    neverEqualsNothing(traits),
  ];
}

// ---------------------------------------------------------------------------
// Predicate form
// ---------------------------------------------------------------------------

export function satisfiesObjectInvariants<T>(traits: EqualityTraits<T>): Check<T> {
  requirePresent(traits, 'traits');
  return describedAs('satisfies object invariants', allOf(...singleChecks(traits)));
}

export function satisfiesObjectInvariantsWith<T>(other: T, traits: EqualityTraits<T>): Check<T> {
  requirePresent(traits, 'traits');
  return describedAs(
    () => `satisfies pairwise object invariants with ${safeToString(other)}`,
    allOf(equalityIsSymmetric(other, traits), hashIsConsistentWithEquals(other, traits)),
  );
}

// ---------------------------------------------------------------------------
// Assert form
// ---------------------------------------------------------------------------

export function assertObjectInvariants<T>(object: T, traits: EqualityTraits<T>): void {
  requirePresent(object, 'object');
  requirePresent(traits, 'traits');
  const [toString, hash, self, nothing] = singleChecks(traits);
  assertAll(
    `Object invariants [${safeToString(object)}]`,
    () => assertThat(object, toString),
    () => assertThat(object, hash),
    () => assertAll(
      'equals',
      () => assertThat(object, self, 'An object is always equivalent to itself'),
      () => assertThat(object, nothing, 'An object is never equivalent to null'),
    ),
  );
}

export function assertObjectInvariantsWith<T>(
  object1: T,
  object2: T,
  traits: EqualityTraits<T>,
): void {
  requirePresent(object1, 'object1');
  requirePresent(object2, 'object2');
  requirePresent(traits, 'traits');
  assertAll(
    `equals [${safeToString(object1)}, ${safeToString(object2)}]`,
    () => assertThat(object1, equalityIsSymmetric(object2, traits), 'Equality is symmetric'),
    () => assertThat(
      object1,
      hashIsConsistentWithEquals(object2, traits),
      'hash is consistent with equals',
    ),
  );
}
