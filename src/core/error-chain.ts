/**
 * Failure aggregation shared by the aggregating executor and the
 * concurrency harness.
 *
 * Invariant violations and accessor faults are collected in the order they
 * were observed. Unrecoverable signals and usage errors are never collected:
 * `add` rethrows them so they escape whatever loop is doing the collecting.
 */

import {
  MultipleFailuresError,
  UsageError,
  isUnrecoverable,
} from './errors.js';

export interface FailureSummary {
  total: number;
  byName: Record<string, number>;
  messages: string[];
}

export class FailureCollector {
  private failures: Error[] = [];

  /**
   * Record a failure. Throws the value itself if it must not be aggregated.
   */
  add(failure: Error): void {
    if (isUnrecoverable(failure) || failure instanceof UsageError) {
      throw failure;
    }
    this.failures.push(failure);
  }

  get count(): number {
    return this.failures.length;
  }

  getAll(): Error[] {
    return [...this.failures];
  }

  summary(): FailureSummary {
    const byName: Record<string, number> = {};
    for (const failure of this.failures) {
      byName[failure.name] = (byName[failure.name] || 0) + 1;
    }
    return {
      total: this.failures.length,
      byName,
      messages: this.failures.map(f => f.message),
    };
  }

  /**
   * Throw one composite failure if anything was collected.
   */
  throwIfAny(heading: string): void {
    if (this.failures.length > 0) {
      throw new MultipleFailuresError(heading, this.getAll());
    }
  }
}
