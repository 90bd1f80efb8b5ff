/**
 * Safe access to operations with no guaranteed behaviour.
 *
 * Equality, comparison, hashing and stringification of the values under test
 * are all caller code. Every call into it goes through here, so that a
 * throwing implementation becomes a diagnosable failure instead of taking
 * the checker down with it. Unrecoverable signals are the one exception:
 * they always propagate unchanged.
 */

import { inspect } from 'node:util';
import { isUnrecoverable } from '../core/errors.js';
import { getConfig } from '../core/config.js';
import type { Description } from './description.js';
import type { CheckOutcome, ValueEquality } from './types.js';

export type Attempt<R> =
  | { ok: true; value: R }
  | { ok: false; failure: CheckOutcome };

/**
 * Invoke `fn` exactly once, converting a throw into a failed outcome.
 */
export function attempt<R>(operation: string, fn: () => R): Attempt<R> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    return {
      ok: false,
      failure: {
        passed: false,
        mismatch: `${operation} must not throw for well-formed input, but threw ${describeThrown(err)}`,
        cause: err,
      },
    };
  }
}

/**
 * Equality with absent-value handling: two absent values are equal, one
 * absent value is unequal and `equals` is not called. `undefined` means the verdict could
 * not be computed; the reason has been appended to `mismatch`.
 */
export function safeEquals<U>(
  equals: ValueEquality<U>,
  a: U | null | undefined,
  b: U | null | undefined,
  mismatch: Description,
  label: string = 'equals()',
): boolean | undefined {
  if ((a === null || a === undefined) && (b === null || b === undefined)) return true;
  if (a === null || a === undefined || b === null || b === undefined) return false;
  try {
    return Boolean(equals(a, b));
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    mismatch.appendClause(`but ${label} threw exception `).appendThrown(err);
    return undefined;
  }
}

export function safeCompare<T>(
  compare: (a: T, b: T) => number,
  a: T,
  b: T,
  mismatch: Description,
): number | undefined {
  let result: unknown;
  try {
    result = compare(a, b);
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    mismatch.appendClause('but compare() threw exception ').appendThrown(err);
    return undefined;
  }
  if (typeof result !== 'number' || !Number.isFinite(result)) {
    mismatch.appendClause('but compare() returned ').appendValue(result);
    return undefined;
  }
  return result;
}

export function safeHash<T>(
  hash: (value: T) => number,
  value: T,
  mismatch: Description,
): number | undefined {
  let result: unknown;
  try {
    result = hash(value);
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    mismatch.appendClause('but hash() threw exception ').appendThrown(err);
    return undefined;
  }
  if (typeof result !== 'number' || !Number.isFinite(result)) {
    mismatch.appendClause('but hash() returned ').appendValue(result);
    return undefined;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/**
 * `<ConstructorName>@<hex id>`, without calling any code of the value itself.
 * The id is stable for the lifetime of the object.
 */
export function identityString(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value !== 'object' && typeof value !== 'function') {
    return typeof value;
  }
  let id = identities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(value, id);
  }
  return `${constructorName(value)}@${id.toString(16)}`;
}

function constructorName(value: object): string {
  try {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'Object';
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    return 'Object';
  }
}

/**
 * Text for a value in a failure message. A throwing `toString` falls back to
 * the identity string; only unrecoverable signals escape.
 */
export function safeToString(
  value: unknown,
  maxLength: number = getConfig().report.maxValueLength,
): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  let text: string;
  try {
    text = render(value);
  } catch (err) {
    if (isUnrecoverable(err)) throw err;
    text = identityString(value);
  }
  return truncate(text, maxLength);
}

function render(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'symbol':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'object':
      if (value !== null && !Array.isArray(value)) {
        const toString: unknown = Reflect.get(value, 'toString');
        if (typeof toString === 'function' && toString !== Object.prototype.toString) {
          return String(toString.call(value));
        }
      }
      return inspect(value, { depth: 2, breakLength: Infinity });
    default:
      return inspect(value);
  }
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

/**
 * Render a thrown value: `Name: message` for errors.
 */
export function describeThrown(value: unknown): string {
  if (value instanceof Error) {
    try {
      return `${value.name}: ${value.message}`;
    } catch (err) {
      if (isUnrecoverable(err)) throw err;
      return identityString(value);
    }
  }
  return safeToString(value);
}
