/**
 * Equivalence Semantics
 *
 * Entity semantics: two objects are equal exactly when their identifiers are
 * equal, whatever their other attributes. Value semantics: equal objects have
 * equal values for an attribute; objects with equal attribute values need not
 * be equal. Value-semantics failures name the attribute, so several checks of
 * the same pair stay distinguishable once aggregated.
 */

import { requirePresent } from '../core/errors.js';
import { assertThat, pairRelationship } from './check.js';
import type { Description } from './description.js';
import { attempt, safeEquals, safeToString } from './safe.js';
import { valueEquals } from './traits.js';
import type { Accessor, Check, EqualityTraits, ValueEquality } from './types.js';

type Equality<T> = Pick<EqualityTraits<T>, 'equals'>;

/**
 * Apply an accessor, recording a throw in the mismatch description.
 * Returns `undefined` when the accessor threw.
 */
function access<T, U>(
  item: T,
  what: string,
  get: Accessor<T, U>,
  mismatch: Description,
): { value: U } | undefined {
  const result = attempt(what, () => get(item));
  if (!result.ok) {
    mismatch
      .appendClause(`failed because getting ${what} threw exception `)
      .appendThrown(result.failure.cause);
    return undefined;
  }
  return { value: result.value };
}

export function hasEntitySemanticsWith<T, U>(
  other: T,
  identifierOf: Accessor<T, U>,
  traits: Equality<T>,
  idEquals: ValueEquality<U> = valueEquals,
): Check<T> {
  requirePresent(identifierOf, 'identifierOf');
  requirePresent(traits, 'traits');

  const getId = (item: T, mismatch: Description): U | undefined => {
    const id = access(item, 'the ID', identifierOf, mismatch);
    if (!id) return undefined;
    if (id.value === null || id.value === undefined) {
      mismatch.appendClause('failed because the ID was null');
      return undefined;
    }
    return id.value;
  };

  return pairRelationship<T, T>(other, 'has entity semantics', (a, b, mismatch) => {
    const id1 = getId(a, mismatch);
    const id2 = getId(b, mismatch);
    const equals = safeEquals<T>((x, y) => traits.equals(x, y), a, b, mismatch);
    if (id1 === undefined || id2 === undefined || equals === undefined) return false;
    const equalIds = safeEquals(idEquals, id1, id2, mismatch, 'ID equals()');
    if (equalIds === undefined) return false;
    if (equals !== equalIds) {
      mismatch
        .appendClause(`not satisfied: equals(x, other) is ${equals} but the IDs `)
        .appendValue(id1)
        .appendText(' and ')
        .appendValue(id2)
        .appendText(equalIds ? ' are equal' : ' differ');
      return false;
    }
    return true;
  });
}

export function hasValueSemanticsWith<T, U>(
  other: T,
  attributeName: string,
  valueOf: Accessor<T, U>,
  traits: Equality<T>,
  attributeEquals: ValueEquality<U> = valueEquals,
): Check<T> {
  requirePresent(attributeName, 'attributeName');
  requirePresent(valueOf, 'valueOf');
  requirePresent(traits, 'traits');

  return pairRelationship<T, T>(
    other,
    `has value semantics with attribute ${attributeName}`,
    (a, b, mismatch) => {
      const what = `attribute ${attributeName}`;
      const attribute1 = access(a, what, valueOf, mismatch);
      const attribute2 = access(b, what, valueOf, mismatch);
      const equals = safeEquals<T>((x, y) => traits.equals(x, y), a, b, mismatch);
      if (!attribute1 || !attribute2 || equals === undefined) return false;
      const equalAttributes = safeEquals(
        attributeEquals,
        attribute1.value,
        attribute2.value,
        mismatch,
        `${attributeName} equals()`,
      );
      if (equalAttributes === undefined) return false;
      if (equals && !equalAttributes) {
        mismatch
          .appendClause(`not satisfied: equal objects have different ${attributeName} values `)
          .appendValue(attribute1.value)
          .appendText(' and ')
          .appendValue(attribute2.value);
        return false;
      }
      return true;
    },
  );
}

// ---------------------------------------------------------------------------
// Assert form
// ---------------------------------------------------------------------------

export function assertEntitySemantics<T, U>(
  object1: T,
  object2: T,
  identifierOf: Accessor<T, U>,
  traits: Equality<T>,
  idEquals?: ValueEquality<U>,
): void {
  requirePresent(object1, 'object1');
  assertThat(
    object1,
    hasEntitySemanticsWith(object2, identifierOf, traits, idEquals),
    () => `Entity semantics for [${safeToString(object1)}, ${safeToString(object2)}]`,
  );
}

export function assertValueSemantics<T, U>(
  object1: T,
  object2: T,
  attributeName: string,
  valueOf: Accessor<T, U>,
  traits: Equality<T>,
  attributeEquals?: ValueEquality<U>,
): void {
  requirePresent(object1, 'object1');
  assertThat(
    object1,
    hasValueSemanticsWith(object2, attributeName, valueOf, traits, attributeEquals),
    () => `Value semantics with attribute [${attributeName}] for [${safeToString(object1)}, ${safeToString(object2)}]`,
  );
}
