import { describe, it, expect } from 'vitest';
import {
  InvariantViolationError,
  MultipleFailuresError,
  UnrecoverableError,
} from '../../../src/core/errors.js';
import { assertAll } from '../../../src/verification/assert-all.js';
import { matches } from '../../../src/verification/check.js';
import {
  assertEntitySemantics,
  assertValueSemantics,
  hasEntitySemanticsWith,
  hasValueSemanticsWith,
} from '../../../src/verification/equivalence-semantics.js';
import type { EqualityTraits } from '../../../src/verification/types.js';
import { Account, Point } from '../../helpers/fixtures.js';

const accounts: Pick<EqualityTraits<Account>, 'equals'> = {
  equals: (a, b) => a.equals(b),
};

/** Compares owners instead of ids. */
const byOwner: Pick<EqualityTraits<Account>, 'equals'> = {
  equals: (a, b) => b !== null && a.owner === b.owner,
};

const points: Pick<EqualityTraits<Point>, 'equals'> = {
  equals: (a, b) => a.equals(b),
};

const idOf = (account: Account) => account.id;

describe('entity semantics', () => {
  it('should pass two objects sharing an id but differing in another attribute', () => {
    expect(() => assertEntitySemantics(
      new Account('acc-1', 'alice'),
      new Account('acc-1', 'bob'),
      idOf,
      accounts,
    )).not.toThrow();
  });

  it('should pass two objects with different ids', () => {
    expect(matches(
      new Account('acc-1', 'alice'),
      hasEntitySemanticsWith(new Account('acc-2', 'alice'), idOf, accounts),
    )).toBe(true);
  });

  it('should fail when either id is null', () => {
    const withId = new Account('acc-1', 'alice');
    const withoutId = new Account(null, 'alice');
    expect(matches(withoutId, hasEntitySemanticsWith(withId, idOf, accounts))).toBe(false);
    expect(matches(withId, hasEntitySemanticsWith(withoutId, idOf, accounts))).toBe(false);
    expect(() => assertEntitySemantics(withoutId, withId, idOf, accounts)).toThrow(
      new InvariantViolationError(
        'Entity semantics for [Account(null), Account(acc-1)]'
          + '\nExpected: has entity semantics'
          + '\n     but: failed because the ID was null',
      ),
    );
  });

  it('should fail when equality does not follow the ids', () => {
    const check = hasEntitySemanticsWith(new Account('acc-2', 'alice'), idOf, byOwner);
    expect(check.evaluate(new Account('acc-1', 'alice')).mismatch)
      .toBe('not satisfied: equals(x, other) is true but the IDs "acc-1" and "acc-2" differ');
  });

  it('should fail when equal ids do not make the objects equal', () => {
    const check = hasEntitySemanticsWith(new Account('acc-1', 'bob'), idOf, byOwner);
    expect(check.evaluate(new Account('acc-1', 'alice')).mismatch)
      .toBe('not satisfied: equals(x, other) is false but the IDs "acc-1" and "acc-1" are equal');
  });

  it('should report a throwing id accessor', () => {
    const boom = new Error('no id');
    const flaky = (account: Account) => {
      if (account.owner === 'ghost') throw boom;
      return account.id;
    };
    const outcome = hasEntitySemanticsWith(new Account('acc-1', 'alice'), flaky, accounts)
      .evaluate(new Account('acc-1', 'ghost'));
    expect(outcome.mismatch).toBe('failed because getting the ID threw exception <Error: no id>');
    expect(outcome.cause).toBe(boom);
  });

  it('should rethrow an unrecoverable error from toString while reporting', () => {
    const fatal = new UnrecoverableError('heap exhausted');
    class Unprintable extends Account {
      toString(): string {
        throw fatal;
      }
    }
    let err: unknown;
    try {
      assertEntitySemantics(new Unprintable(null, 'alice'), new Unprintable(null, 'bob'), idOf, accounts);
    } catch (thrown) {
      err = thrown;
    }
    expect(err).toBe(fatal);
  });

  it('should use a custom id equality', () => {
    const caseless = (a: string | null, b: string | null) =>
      a !== null && b !== null && a.toLowerCase() === b.toLowerCase();
    const upper: Pick<EqualityTraits<Account>, 'equals'> = {
      equals: (a, b) => b !== null && a.id !== null && b.id !== null
        && a.id.toLowerCase() === b.id.toLowerCase(),
    };
    expect(() => assertEntitySemantics(
      new Account('ACC-1', 'alice'),
      new Account('acc-1', 'alice'),
      idOf,
      upper,
      caseless,
    )).not.toThrow();
  });
});

describe('value semantics', () => {
  const x = (p: Point) => p.x;
  const label = (p: Point) => p.label;

  it('should pass for attributes that take part in equality', () => {
    expect(() => assertValueSemantics(new Point(1, 2, 'a'), new Point(1, 2, 'b'), 'x', x, points))
      .not.toThrow();
  });

  it('should not require unequal objects to differ in the attribute', () => {
    expect(matches(new Point(1, 2, 'a'), hasValueSemanticsWith(new Point(1, 3, 'a'), 'x', x, points)))
      .toBe(true);
  });

  it('should fail equal objects with different attribute values', () => {
    const check = hasValueSemanticsWith(new Point(1, 2, 'b'), 'label', label, points);
    expect(check.describe()).toBe('has value semantics with attribute label');
    expect(check.evaluate(new Point(1, 2, 'a')).mismatch)
      .toBe('not satisfied: equal objects have different label values "a" and "b"');
  });

  it('should name the attribute in the assert form', () => {
    expect(() => assertValueSemantics(new Point(1, 2, 'a'), new Point(1, 2, 'b'), 'label', label, points))
      .toThrow('Value semantics with attribute [label] for [(1, 2), (1, 2)]');
  });

  it('should keep aggregated failures distinguishable by attribute', () => {
    const p1 = new Point(1, 2, 'a');
    const p2 = new Point(1, 2, 'b');
    let caught: unknown;
    try {
      assertAll(
        'point semantics',
        () => assertValueSemantics(p1, p2, 'x', x, points),
        () => assertValueSemantics(p1, p2, 'label', label, points),
        () => assertValueSemantics(p1, p2, 'tag', label, points),
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MultipleFailuresError);
    if (!(caught instanceof MultipleFailuresError)) return;
    expect(caught.failures.map(f => f.message.split('\n')[0])).toEqual([
      'Value semantics with attribute [label] for [(1, 2), (1, 2)]',
      'Value semantics with attribute [tag] for [(1, 2), (1, 2)]',
    ]);
  });

  it('should report a throwing attribute accessor', () => {
    const check = hasValueSemanticsWith(new Point(1, 2, 'b'), 'label', () => {
      throw new Error('hidden');
    }, points);
    expect(check.evaluate(new Point(1, 2, 'a')).mismatch).toBe(
      'failed because getting attribute label threw exception <Error: hidden>, '
        + 'failed because getting attribute label threw exception <Error: hidden>',
    );
  });

  it('should rethrow an unrecoverable error from the attribute accessor unwrapped', () => {
    const fatal = new UnrecoverableError('heap exhausted');
    let err: unknown;
    try {
      assertValueSemantics(new Point(1, 2, 'a'), new Point(1, 2, 'b'), 'label', () => {
        throw fatal;
      }, points);
    } catch (thrown) {
      err = thrown;
    }
    expect(err).toBe(fatal);
  });
});
