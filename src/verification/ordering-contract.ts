/**
 * Ordering Contract
 *
 * Total-order axioms for a comparison function. Only the sign of a
 * comparison is meaningful. Consistency of the ordering with equality is
 * opt-in: a natural order need not agree with `equals` (1.0 and 1.00 compare
 * as equal but are different decimals).
 */

import { UsageError, isUnrecoverable, requirePresent } from '../core/errors.js';
import { assertAll } from './assert-all.js';
import {
  allOf,
  assertThat,
  createCheck,
  describedAs,
  methodDoesNotThrow,
  pairRelationship,
  tripleRelationship,
} from './check.js';
import { safeCompare, safeEquals, safeToString } from './safe.js';
import type { Check, OrderingTraits } from './types.js';

export interface PairwiseOrderingOptions {
  /** Also require `compare(a, b) == 0` exactly when `equals(a, b)`. */
  consistentWithEquals?: boolean;
}

function comparator<T>(traits: OrderingTraits<T>): (a: T, b: T) => number {
  return (a, b) => traits.compare(a, b);
}

function isInvalidComparison<T>(traits: OrderingTraits<T>, error: unknown): boolean {
  return traits.isInvalidComparison
    ? traits.isInvalidComparison(error)
    : error instanceof TypeError;
}

// ---------------------------------------------------------------------------
// Sub-checks
// ---------------------------------------------------------------------------

export function compareToNothingThrows<T>(traits: OrderingTraits<T>): Check<T> {
  const signal = traits.isInvalidComparison ? 'an invalid-comparison error' : 'a TypeError';
  return createCheck<T>(`compare(x, null) throws ${signal}`, (item, mismatch) => {
    try {
      traits.compare(item, null);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      if (isInvalidComparison(traits, err)) return true;
      mismatch.appendClause('but threw ').appendThrown(err);
      return false;
    }
    mismatch.appendClause('but did not throw an exception');
    return false;
  });
}

export function compareToSelfDoesNotThrow<T>(traits: OrderingTraits<T>): Check<T> {
  return methodDoesNotThrow<T>('compare(x, x)', item => traits.compare(item, item));
}

export function compareIsAntisymmetric<T>(other: T, traits: OrderingTraits<T>): Check<T> {
  const compare = comparator(traits);
  return pairRelationship<T, T>(other, 'compare is antisymmetric', (a, b, mismatch) => {
    const c12 = safeCompare(compare, a, b, mismatch);
    const c21 = safeCompare(compare, b, a, mismatch);
    if (c12 === undefined || c21 === undefined) return false;
    if (Math.sign(c12) !== -Math.sign(c21)) {
      mismatch.appendClause(
        `not satisfied: compare(x, other) is ${c12} but compare(other, x) is ${c21}`,
      );
      return false;
    }
    return true;
  });
}

export function orderingIsConsistentWithEqualsWith<T>(other: T, traits: OrderingTraits<T>): Check<T> {
  requirePresent(traits, 'traits');
  const equals = traits.equals;
  if (!equals) {
    throw new UsageError('traits.equals is required to check consistency with equals');
  }
  const compare = comparator(traits);
  return pairRelationship<T, T>(
    other,
    'natural ordering is consistent with equals',
    (a, b, mismatch) => {
      const c = safeCompare(compare, a, b, mismatch);
      const e = safeEquals<T>((x, y) => equals.call(traits, x, y), a, b, mismatch);
      if (c === undefined || e === undefined) return false;
      if ((c === 0) !== e) {
        mismatch.appendClause(`not satisfied: compare(x, other) is ${c} but equals(x, other) is ${e}`);
        return false;
      }
      return true;
    },
  );
}

/**
 * If any of the three comparisons cannot be computed the check fails.
 */
export function compareIsTransitive<T>(item2: T, item3: T, traits: OrderingTraits<T>): Check<T> {
  const compare = comparator(traits);
  return tripleRelationship<T, T, T>(item2, item3, 'compare is transitive', (x, y, z, mismatch) => {
    const cxy = safeCompare(compare, x, y, mismatch);
    const cyz = safeCompare(compare, y, z, mismatch);
    const cxz = safeCompare(compare, x, z, mismatch);
    if (cxy === undefined || cyz === undefined || cxz === undefined) return false;
    if (cxy > 0 && cyz > 0 && !(cxz > 0)) {
      mismatch.appendClause(
        `not satisfied: compare(x, y) is ${cxy} and compare(y, z) is ${cyz} but compare(x, z) is ${cxz}`,
      );
      return false;
    }
    return true;
  });
}

function pairChecks<T>(
  other: T,
  traits: OrderingTraits<T>,
  options: PairwiseOrderingOptions,
): Check<T>[] {
  const checks = [compareIsAntisymmetric(other, traits)];
  if (options.consistentWithEquals) {
    checks.push(orderingIsConsistentWithEqualsWith(other, traits));
  }
  return checks;
}

// ---------------------------------------------------------------------------
// Predicate form
// ---------------------------------------------------------------------------

export function satisfiesOrderingInvariants<T>(traits: OrderingTraits<T>): Check<T> {
  requirePresent(traits, 'traits');
  return describedAs(
    'satisfies ordering invariants',
    allOf(compareToNothingThrows(traits), compareToSelfDoesNotThrow(traits)),
  );
}

export function satisfiesOrderingInvariantsWith<T>(
  other: T,
  traits: OrderingTraits<T>,
  options: PairwiseOrderingOptions = {},
): Check<T> {
  requirePresent(traits, 'traits');
  return describedAs(
    () => `satisfies pairwise ordering invariants with ${safeToString(other)}`,
    allOf(...pairChecks(other, traits, options)),
  );
}

export function satisfiesOrderingInvariantsWith2<T>(
  item2: T,
  item3: T,
  traits: OrderingTraits<T>,
): Check<T> {
  requirePresent(traits, 'traits');
  return compareIsTransitive(item2, item3, traits);
}

// ---------------------------------------------------------------------------
// Assert form
// ---------------------------------------------------------------------------

export function assertOrderingInvariants<T>(object: T, traits: OrderingTraits<T>): void {
  requirePresent(object, 'object');
  requirePresent(traits, 'traits');
  assertAll(
    `Ordering invariants [${safeToString(object)}]`,
    () => assertThat(object, compareToNothingThrows(traits)),
    () => assertThat(object, compareToSelfDoesNotThrow(traits)),
  );
}

export function assertOrderingInvariantsWith<T>(
  object1: T,
  object2: T,
  traits: OrderingTraits<T>,
  options: PairwiseOrderingOptions = {},
): void {
  requirePresent(object1, 'object1');
  requirePresent(object2, 'object2');
  requirePresent(traits, 'traits');
  const checks = pairChecks(object2, traits, options);
  assertAll(
    `compare [${safeToString(object1)}, ${safeToString(object2)}]`,
    checks.map(check => () => assertThat(object1, check)),
  );
}

export function assertOrderingInvariantsWith2<T>(
  object1: T,
  object2: T,
  object3: T,
  traits: OrderingTraits<T>,
): void {
  requirePresent(object1, 'object1');
  requirePresent(traits, 'traits');
  const transitive = compareIsTransitive(object2, object3, traits);
  assertAll(
    `compare [${safeToString(object1)}, ${safeToString(object2)}, ${safeToString(object3)}]`,
    () => assertThat(object1, transitive),
  );
}

export function assertOrderingConsistentWithEquals<T>(
  object1: T,
  object2: T,
  traits: OrderingTraits<T>,
): void {
  requirePresent(object1, 'object1');
  assertThat(
    object1,
    orderingIsConsistentWithEqualsWith(object2, traits),
    'Natural ordering is consistent with equals',
  );
}
