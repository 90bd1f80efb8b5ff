/**
 * Checks: relationship bases and combinators
 *
 * A check binds its external operands when it is built and defers the
 * verdict to a predicate closure. Three arities are offered: self, pair and
 * triple. Predicates report why they failed through a `Description`, which
 * is only rendered into text when the check fails.
 */

import { InvariantViolationError, isUnrecoverable, requirePresent } from '../core/errors.js';
import { Description } from './description.js';
import { attempt, describeThrown } from './safe.js';
import type { Accessor, Check, CheckOutcome, Describer } from './types.js';

export type Predicate<T> = (item: T, mismatch: Description) => boolean;
export type SelfPredicate<T> = (item: T, self: T, mismatch: Description) => boolean;
export type PairPredicate<T, U> = (item: T, other: U, mismatch: Description) => boolean;
export type TriplePredicate<T, U, V> = (
  item: T,
  item2: U,
  item3: V,
  mismatch: Description,
) => boolean;

export type ErrorClass = abstract new (...args: never[]) => Error;

function resolve(describer: Describer): string {
  return typeof describer === 'string' ? describer : describer();
}

/**
 * Evaluate a predicate once, isolating the checker from anything it throws.
 */
function evaluatePredicate<T>(item: T, predicate: Predicate<T>): CheckOutcome {
  if (item === null || item === undefined) {
    return { passed: false, mismatch: `was ${String(item)}` };
  }
  const mismatch = new Description();
  let passed: boolean;
  try {
    passed = predicate(item, mismatch);
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    return {
      passed: false,
      mismatch: `failed because the check threw ${describeThrown(err)}`,
      cause: err,
    };
  }
  if (passed) {
    return { passed: true };
  }
  return {
    passed: false,
    mismatch: mismatch.isEmpty ? 'not satisfied' : mismatch.toString(),
    cause: mismatch.cause,
  };
}

export function createCheck<T>(describe: Describer, predicate: Predicate<T>): Check<T> {
  return {
    describe: () => resolve(describe),
    evaluate: item => evaluatePredicate(item, predicate),
  };
}

// ---------------------------------------------------------------------------
// Relationship bases
// ---------------------------------------------------------------------------

export function selfRelationship<T>(describe: Describer, predicate: SelfPredicate<T>): Check<T> {
  return createCheck<T>(describe, (item, mismatch) => predicate(item, item, mismatch));
}

export function pairRelationship<T, U>(
  other: U,
  describe: Describer,
  predicate: PairPredicate<T, U>,
): Check<T> {
  const bound = requirePresent(other, 'other');
  return createCheck<T>(describe, (item, mismatch) => predicate(item, bound, mismatch));
}

export function tripleRelationship<T, U, V>(
  item2: U,
  item3: V,
  describe: Describer,
  predicate: TriplePredicate<T, U, V>,
): Check<T> {
  const bound2 = requirePresent(item2, 'item2');
  const bound3 = requirePresent(item3, 'item3');
  return createCheck<T>(describe, (item, mismatch) => predicate(item, bound2, bound3, mismatch));
}

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

/**
 * AND of several checks. Every check is evaluated; the mismatch lists each
 * one that failed.
 */
export function allOf<T>(...checks: Check<T>[]): Check<T> {
  return {
    describe: () => `(${checks.map(c => c.describe()).join(' and ')})`,
    evaluate(item) {
      const failures: string[] = [];
      let cause: unknown;
      for (const check of checks) {
        const outcome = check.evaluate(item);
        if (!outcome.passed) {
          failures.push(`${check.describe()} ${outcome.mismatch ?? 'not satisfied'}`);
          if (cause === undefined) cause = outcome.cause;
        }
      }
      if (failures.length === 0) return { passed: true };
      return { passed: false, mismatch: failures.join(', and '), cause };
    },
  };
}

export function describedAs<T>(description: Describer, check: Check<T>): Check<T> {
  return {
    describe: () => resolve(description),
    evaluate: item => check.evaluate(item),
  };
}

export function matches<T>(item: T, check: Check<T>): boolean {
  return check.evaluate(item).passed;
}

/**
 * Raise an `InvariantViolationError` if `item` fails `check`.
 */
export function assertThat<T>(item: T, check: Check<T>, reason?: Describer): void {
  const outcome = check.evaluate(item);
  if (outcome.passed) return;
  const lines = [
    `Expected: ${check.describe()}`,
    `     but: ${outcome.mismatch ?? 'not satisfied'}`,
  ];
  if (reason) lines.unshift(resolve(reason));
  throw new InvariantViolationError(lines.join('\n'), outcome.cause);
}

export function assertTrue(reason: string, condition: boolean): void {
  if (!condition) {
    throw new InvariantViolationError(reason);
  }
}

// ---------------------------------------------------------------------------
// General purpose checks
// ---------------------------------------------------------------------------

export function satisfies<T>(description: string, predicate: (item: T) => boolean): Check<T> {
  return createCheck<T>(description, (item, mismatch) => {
    let ok: boolean;
    try {
      ok = predicate(item);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      mismatch.appendClause('failed because predicate threw ').appendThrown(err);
      return false;
    }
    return ok;
  });
}

export function hasRelationship<T, U>(
  description: string,
  other: U,
  predicate: (item: T, other: U) => boolean,
): Check<T> {
  return pairRelationship<T, U>(other, description, (item, bound, mismatch) => {
    let ok: boolean;
    try {
      ok = predicate(item, bound);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      mismatch.appendClause('failed because predicate threw ').appendThrown(err);
      return false;
    }
    return ok;
  });
}

export function methodDoesNotThrow<T>(methodName: string, method: (item: T) => unknown): Check<T> {
  return createCheck<T>(`method ${methodName} does not throw an exception`, (item, mismatch) => {
    try {
      method(item);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      mismatch.appendClause('failed because it threw exception ').appendThrown(err);
      return false;
    }
    return true;
  });
}

export function methodThrows<T>(
  methodName: string,
  expected: ErrorClass,
  method: (item: T) => unknown,
): Check<T> {
  return createCheck<T>(
    () => `method ${methodName} throws an exception of class ${expected.name}`,
    (item, mismatch) => {
      try {
        method(item);
      } catch (err) {
        if (isUnrecoverable(err)) throw err;
        if (err instanceof expected) return true;
        mismatch.appendClause('failed because it instead threw exception ').appendThrown(err);
        return false;
      }
      mismatch.appendClause('failed because it did not throw an exception');
      return false;
    },
  );
}

/**
 * Apply `check` to a value derived from the item.
 */
export function feature<T, U>(name: string, get: Accessor<T, U>, check: Check<U>): Check<T> {
  return createCheck<T>(
    () => `${name} ${check.describe()}`,
    (item, mismatch) => {
      const value = attempt(`getting ${name}`, () => get(item));
      if (!value.ok) {
        mismatch.appendClause(value.failure.mismatch ?? '').recordCause(value.failure.cause);
        return false;
      }
      const outcome = check.evaluate(value.value);
      if (!outcome.passed) {
        mismatch.appendClause(`${name} ${outcome.mismatch ?? 'not satisfied'}`);
      }
      return outcome.passed;
    },
  );
}

export function featuresHaveRelationship<T, U, V>(
  description: string,
  get1: Accessor<T, U>,
  get2: Accessor<T, V>,
  predicate: (f1: U, f2: V) => boolean,
): Check<T> {
  return createCheck<T>(description, (item, mismatch) => {
    let f1: U;
    let f2: V;
    try {
      f1 = get1(item);
      f2 = get2(item);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      mismatch.appendClause('failed because an accessor function threw ').appendThrown(err);
      return false;
    }
    let ok: boolean;
    try {
      ok = predicate(f1, f2);
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      mismatch.appendClause('failed because the predicate threw ').appendThrown(err);
      return false;
    }
    if (!ok) {
      mismatch
        .appendClause('not satisfied, with attribute values ')
        .appendValue(f1)
        .appendText(' and ')
        .appendValue(f2);
    }
    return ok;
  });
}
