/**
 * Concurrency Harness Module
 *
 * @example
 * ```typescript
 * import { runConcurrently } from 'contract-assertions';
 *
 * const counter = new AtomicCounter();
 * await runConcurrently(async () => {
 *   await counter.increment();
 * }, { workers: 8 });
 * ```
 */

export { CountdownLatch } from './latch.js';
export {
  runInWorker,
  awaitWorker,
  collectAll,
  runConcurrently,
  INTERRUPTED_MESSAGE,
} from './harness.js';
export type {
  WorkerState,
  WorkerOutcome,
  WorkerOperation,
  WorkerHandle,
  AwaitOptions,
  CollectOptions,
  RunConcurrentlyOptions,
} from './harness.js';
