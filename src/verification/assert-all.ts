/**
 * Aggregating Executor
 *
 * Runs every operation of a sequence, collecting failures instead of
 * stopping at the first, and reports them as one `MultipleFailuresError`.
 * Unrecoverable signals and usage errors abort the sequence unwrapped.
 */

import { InvariantViolationError, UsageError } from '../core/errors.js';
import { FailureCollector } from '../core/error-chain.js';
import { getLogger } from '../core/logger.js';
import { describeThrown } from './safe.js';
import type { Operation, Verifier } from './types.js';

export const DEFAULT_HEADING = 'Multiple failures';

type Heading = string | null | undefined;

type AsyncOperation = () => Promise<void> | void;

/**
 * Errors are collected as they are; any other thrown value is wrapped so the
 * composite can list it.
 */
export function toFailure(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new InvariantViolationError(`Non-error value thrown: ${describeThrown(thrown)}`, thrown);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object'
    && value !== null
    && typeof Reflect.get(value, Symbol.iterator) === 'function';
}

function isOperation(value: unknown): value is Operation {
  return typeof value === 'function';
}

function isAsyncOperation(value: unknown): value is AsyncOperation {
  return typeof value === 'function';
}

/**
 * Materialize the sequence and check every element before any of them runs.
 */
function requireOperations<O>(
  candidates: Iterable<unknown>,
  isValid: (value: unknown) => value is O,
): O[] {
  const operations: O[] = [];
  for (const candidate of candidates) {
    if (!isValid(candidate)) {
      throw new UsageError(`operation ${operations.length} must be a function`);
    }
    operations.push(candidate);
  }
  return operations;
}

function logFinished(message: string, heading: string, attempted: number, collector: FailureCollector): void {
  const { total, byName } = collector.summary();
  getLogger().debug({ heading, attempted, failed: total, byName }, message);
}

export function assertAll(heading: Heading, operations: Iterable<Operation>): void;
export function assertAll(heading: Heading, ...operations: Operation[]): void;
export function assertAll(heading: Heading, ...rest: unknown[]): void {
  const [first] = rest;
  const operations = requireOperations(
    rest.length === 1 && isIterable(first) ? first : rest,
    isOperation,
  );
  const label = heading ?? DEFAULT_HEADING;
  const collector = new FailureCollector();
  let attempted = 0;
  for (const operation of operations) {
    attempted++;
    try {
      operation();
    } catch (err) {
      collector.add(toFailure(err));
    }
  }
  logFinished('assertAll finished', label, attempted, collector);
  collector.throwIfAny(label);
}

/**
 * Async counterpart of `assertAll`. Operations run one after another, in
 * order; a rejection is collected like a throw.
 */
export async function assertAllAsync(
  heading: Heading,
  operations: Iterable<AsyncOperation>,
): Promise<void> {
  const checked = requireOperations(operations, isAsyncOperation);
  const collector = new FailureCollector();
  const label = heading ?? DEFAULT_HEADING;
  let attempted = 0;
  for (const operation of checked) {
    attempted++;
    try {
      await operation();
    } catch (err) {
      collector.add(toFailure(err));
    }
  }
  logFinished('assertAllAsync finished', label, attempted, collector);
  collector.throwIfAny(label);
}

/**
 * Apply `verifier` to every element, reporting all elements that fail.
 */
export function assertForAllElements<T>(
  heading: Heading,
  elements: Iterable<T>,
  verifier: Verifier<T>,
): void {
  const operations: Operation[] = [];
  for (const element of elements) {
    operations.push(() => verifier(element));
  }
  assertAll(heading, operations);
}
