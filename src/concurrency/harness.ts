/**
 * Concurrency Harness
 *
 * Spawns workers that block on a shared gate, opens the gate so they all
 * become runnable together, then collects every outcome in submission
 * order. Collection never stops at the first failure; failures are merged
 * with the same policy as `assertAll`.
 *
 * A worker is an async task on the event loop. Interleaving happens at the
 * operation's own `await` points, so operations that exercise shared state
 * should yield (timers, I/O, `await` on the object under test).
 */

import { nanoid } from 'nanoid';
import {
  InvariantViolationError,
  MultipleFailuresError,
  UsageError,
  WorkerFaultError,
} from '../core/errors.js';
import { FailureCollector } from '../core/error-chain.js';
import { getConfig } from '../core/config.js';
import { getLogger } from '../core/logger.js';
import { describeThrown } from '../verification/safe.js';
import { CountdownLatch } from './latch.js';

export type WorkerState = 'created' | 'blocked' | 'running' | 'succeeded' | 'failed';

export type WorkerOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; error: unknown };

export type WorkerOperation = () => void | Promise<void>;

export interface WorkerHandle {
  readonly id: string;
  readonly state: WorkerState;
  /** Written once, when the worker finishes. */
  readonly outcome: WorkerOutcome | undefined;
  /** Resolves with the outcome. Never rejects. */
  readonly settled: Promise<WorkerOutcome>;
}

export interface AwaitOptions {
  /** Aborting interrupts the collector, not the workers. */
  signal?: AbortSignal;
}

export interface CollectOptions extends AwaitOptions {
  heading?: string;
}

export interface RunConcurrentlyOptions extends CollectOptions {
  /** Copies of a single operation to run. Defaults to `concurrency.defaultWorkers`. */
  workers?: number;
}

export const INTERRUPTED_MESSAGE = 'Test workers should not be interrupted';

class Worker implements WorkerHandle {
  readonly id = `worker_${nanoid(8)}`;
  readonly settled: Promise<WorkerOutcome>;
  private _state: WorkerState = 'created';
  private _outcome: WorkerOutcome | undefined;

  constructor(gate: CountdownLatch, operation: WorkerOperation) {
    // Runs synchronously up to the gate, so the worker is blocked on return.
    this.settled = this.run(gate, operation);
  }

  get state(): WorkerState {
    return this._state;
  }

  get outcome(): WorkerOutcome | undefined {
    return this._outcome;
  }

  private async run(gate: CountdownLatch, operation: WorkerOperation): Promise<WorkerOutcome> {
    this._state = 'blocked';
    await gate.wait();
    this._state = 'running';
    let outcome: WorkerOutcome;
    try {
      await operation();
      outcome = { status: 'succeeded' };
    } catch (err) {
      outcome = { status: 'failed', error: err };
    }
    this._outcome = outcome;
    this._state = outcome.status;
    return outcome;
  }
}

export function runInWorker(gate: CountdownLatch, operation: WorkerOperation): WorkerHandle {
  if (typeof operation !== 'function') {
    throw new UsageError('worker operation must be a function');
  }
  return new Worker(gate, operation);
}

/**
 * Settle order between the worker and an abort of the collector.
 */
function untilSettledOrAborted(
  handle: WorkerHandle,
  signal: AbortSignal | undefined,
): Promise<WorkerOutcome | 'aborted'> {
  if (handle.outcome) return Promise.resolve(handle.outcome);
  if (!signal) return handle.settled;
  if (signal.aborted) return Promise.resolve<'aborted'>('aborted');
  return new Promise<WorkerOutcome | 'aborted'>((resolve) => {
    const onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
    void handle.settled.then(
      (outcome) => {
        signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      },
      // settled never rejects
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ status: 'failed', error: err });
      },
    );
  });
}

function toWorkerFailure(handle: WorkerHandle, error: unknown): Error {
  if (error instanceof Error) return error;
  return new WorkerFaultError(
    `Worker ${handle.id} threw a non-error value: ${describeThrown(error)}`,
    handle.id,
    error,
  );
}

/**
 * Wait for one worker and rethrow what it threw. Errors are rethrown as they
 * are; any other value is wrapped in `WorkerFaultError`.
 */
export async function awaitWorker(handle: WorkerHandle, options: AwaitOptions = {}): Promise<void> {
  const outcome = await untilSettledOrAborted(handle, options.signal);
  if (outcome === 'aborted') {
    throw new InvariantViolationError(INTERRUPTED_MESSAGE, options.signal?.reason);
  }
  if (outcome.status === 'failed') {
    throw toWorkerFailure(handle, outcome.error);
  }
}

/**
 * Wait for every worker in submission order. One failure is rethrown as it
 * is; several are merged into a `MultipleFailuresError`.
 *
 * If the signal aborts, the interruption is recorded once and the workers
 * that have not finished yet are no longer waited for.
 */
export async function collectAll(
  handles: readonly WorkerHandle[],
  options: CollectOptions = {},
): Promise<void> {
  const logger = getLogger();
  const collector = new FailureCollector();
  let interrupted = false;

  for (const handle of handles) {
    const outcome = interrupted
      ? handle.outcome
      : await untilSettledOrAborted(handle, options.signal);
    if (outcome === undefined) continue;
    if (outcome === 'aborted') {
      interrupted = true;
      logger.warn({ workerId: handle.id }, 'collection interrupted');
      collector.add(new InvariantViolationError(INTERRUPTED_MESSAGE, options.signal?.reason));
      continue;
    }
    if (outcome.status === 'failed') {
      // add() rethrows unrecoverable failures
      collector.add(toWorkerFailure(handle, outcome.error));
    }
  }

  const { total, byName } = collector.summary();
  logger.debug(
    { workers: handles.length, failed: total, byName, interrupted },
    'workers collected',
  );

  const failures = collector.getAll();
  if (failures.length === 1) throw failures[0];
  if (failures.length > 1) {
    throw new MultipleFailuresError(
      options.heading ?? `${failures.length} of ${handles.length} workers failed`,
      failures,
    );
  }
}

function resolveOperations(
  operations: WorkerOperation | readonly WorkerOperation[],
  workers: number | undefined,
): readonly WorkerOperation[] {
  if (typeof operations === 'function') {
    const count = workers ?? getConfig().concurrency.defaultWorkers;
    if (!Number.isInteger(count) || count < 1) {
      throw new UsageError(`workers must be a positive integer, got ${count}`);
    }
    const operation = operations;
    return Array.from({ length: count }, () => operation);
  }
  if (operations.length === 0) {
    throw new UsageError('at least one worker operation is required');
  }
  if (workers !== undefined && workers !== operations.length) {
    throw new UsageError(`workers (${workers}) does not match the ${operations.length} operations given`);
  }
  for (const [i, op] of operations.entries()) {
    if (typeof op !== 'function') {
      throw new UsageError(`worker operation ${i} must be a function`);
    }
  }
  return operations;
}

/**
 * Run operations concurrently: each on its own worker, all released by one
 * gate, all outcomes collected.
 */
export async function runConcurrently(
  operations: WorkerOperation | readonly WorkerOperation[],
  options: RunConcurrentlyOptions = {},
): Promise<void> {
  const ops = resolveOperations(operations, options.workers);
  const logger = getLogger();
  const { warnAboveWorkers } = getConfig().concurrency;
  if (ops.length > warnAboveWorkers) {
    logger.warn({ workers: ops.length, warnAboveWorkers }, 'large worker count requested');
  }

  const gate = new CountdownLatch(1);
  const handles = ops.map(op => runInWorker(gate, op));
  logger.debug({ workers: handles.map(h => h.id) }, 'workers blocked on gate');

  gate.countDown();
  logger.debug({ workers: handles.length }, 'gate released');

  await collectAll(handles, { heading: options.heading, signal: options.signal });
}
