import { describe, it, expect } from 'vitest';
import {
  InvariantViolationError,
  MultipleFailuresError,
  UnrecoverableError,
  UsageError,
} from '../../../src/core/errors.js';
import {
  DEFAULT_HEADING,
  assertAll,
  assertAllAsync,
  assertForAllElements,
  toFailure,
} from '../../../src/verification/assert-all.js';
import { assertTrue } from '../../../src/verification/check.js';

function caught(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('assertAll', () => {
  it('should return normally when nothing fails', () => {
    let runs = 0;
    assertAll('all good', () => {
      runs++;
    }, () => {
      runs++;
    });
    expect(runs).toBe(2);
  });

  it('should attempt all k operations and report exactly the m failures', () => {
    const attempted: number[] = [];
    const ops = [0, 1, 2, 3, 4].map(i => () => {
      attempted.push(i);
      assertTrue(`operation ${i} holds`, i % 2 === 0);
    });

    const err = caught(() => assertAll('five checks', ...ops));
    expect(attempted).toEqual([0, 1, 2, 3, 4]);
    expect(err).toBeInstanceOf(MultipleFailuresError);
    if (!(err instanceof MultipleFailuresError)) return;
    expect(err.failures).toHaveLength(2);
    expect(err.message).toBe('five checks (2 failures)\n\toperation 1 holds\n\toperation 3 holds');
    expect(err.primary).toBe(err.failures[0]);
    expect(err.cause).toBe(err.failures[0]);
  });

  it('should raise a composite even for a single failure', () => {
    const failure = new InvariantViolationError('only one');
    const err = caught(() => assertAll('single', () => {
      throw failure;
    }));
    expect(err).toBeInstanceOf(MultipleFailuresError);
    if (!(err instanceof MultipleFailuresError)) return;
    expect(err.primary).toBe(failure);
  });

  it('should use the default heading', () => {
    expect(() => assertAll(null, () => {
      throw new Error('x');
    })).toThrow(`${DEFAULT_HEADING} (1 failure)\n\tx`);
  });

  it('should accept operations as an iterable', () => {
    const ops = new Set([
      () => {
        throw new Error('a');
      },
      () => {
        throw new Error('b');
      },
    ]);
    expect(() => assertAll('from a set', ops)).toThrow('from a set (2 failures)\n\ta\n\tb');
  });

  it('should stop at an unrecoverable error and rethrow it unwrapped', () => {
    const fatal = new UnrecoverableError('heap exhausted');
    let ranAfter = false;
    const err = caught(() => assertAll(
      'aborting',
      () => {
        throw new Error('ordinary');
      },
      () => {
        throw fatal;
      },
      () => {
        ranAfter = true;
      },
    ));
    expect(err).toBe(fatal);
    expect(ranAfter).toBe(false);
  });

  it('should not aggregate usage errors', () => {
    const usage = new UsageError('other must not be null');
    expect(caught(() => assertAll('usage', () => {
      throw usage;
    }))).toBe(usage);
  });

  it('should reject a missing operation in the argument list before running any', () => {
    let ran = 0;
    const op = () => {
      ran++;
    };
    const err = caught(() => Reflect.apply(assertAll, undefined, ['gaps', op, null, op]));
    expect(err).toBeInstanceOf(UsageError);
    expect(err).toHaveProperty('message', 'operation 1 must be a function');
    expect(ran).toBe(0);
  });

  it('should reject a missing operation in an iterable before running any', () => {
    let ran = 0;
    const ops = [
      () => {
        ran++;
      },
      () => {
        ran++;
      },
    ];
    Reflect.set(ops, 1, undefined);
    const err = caught(() => assertAll('gaps', ops));
    expect(err).toBeInstanceOf(UsageError);
    expect(err).toHaveProperty('message', 'operation 1 must be a function');
    expect(ran).toBe(0);
  });

  it('should wrap thrown values that are not errors', () => {
    const err = caught(() => assertAll('strings', () => {
      throw 'plain text';
    }));
    expect(err).toBeInstanceOf(MultipleFailuresError);
    if (!(err instanceof MultipleFailuresError)) return;
    expect(err.primary).toBeInstanceOf(InvariantViolationError);
    expect(err.primary.message).toBe('Non-error value thrown: plain text');
  });

  it('should nest composites', () => {
    const err = caught(() => assertAll(
      'outer',
      () => assertAll('inner', () => assertTrue('deep', false)),
    ));
    expect(err).toBeInstanceOf(MultipleFailuresError);
    if (!(err instanceof MultipleFailuresError)) return;
    expect(err.message).toBe('outer (1 failure)\n\tinner (1 failure)\n\tdeep');
  });
});

describe('toFailure', () => {
  it('should keep errors as they are', () => {
    const err = new TypeError('x');
    expect(toFailure(err)).toBe(err);
  });

  it('should keep the original value as cause', () => {
    const wrapped = toFailure(42);
    expect(wrapped).toBeInstanceOf(InvariantViolationError);
    if (!(wrapped instanceof InvariantViolationError)) return;
    expect(wrapped.cause).toBe(42);
  });
});

describe('assertForAllElements', () => {
  it('should report every failing element', () => {
    const err = caught(() => assertForAllElements('odd numbers', [1, 2, 3, 4], n => {
      assertTrue(`${n} is odd`, n % 2 === 1);
    }));
    expect(err).toBeInstanceOf(MultipleFailuresError);
    if (!(err instanceof MultipleFailuresError)) return;
    expect(err.failures.map(f => f.message)).toEqual(['2 is odd', '4 is odd']);
  });

  it('should pass for an empty sequence', () => {
    expect(() => assertForAllElements<number>(undefined, [], () => {
      throw new Error('never');
    })).not.toThrow();
  });
});

describe('assertAllAsync', () => {
  it('should run operations in order and collect rejections', async () => {
    const order: string[] = [];
    await expect(assertAllAsync('async checks', [
      async () => {
        order.push('a');
        throw new Error('first');
      },
      () => {
        order.push('b');
      },
      async () => {
        order.push('c');
        throw new Error('third');
      },
    ])).rejects.toThrow('async checks (2 failures)\n\tfirst\n\tthird');
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('should reject a missing operation before running any', async () => {
    let ran = 0;
    const ops = [
      async () => {
        ran++;
      },
      async () => {
        ran++;
      },
    ];
    Reflect.set(ops, 0, null);
    await expect(assertAllAsync('gaps', ops)).rejects.toThrow(UsageError);
    await expect(assertAllAsync('gaps', ops)).rejects.toThrow('operation 0 must be a function');
    expect(ran).toBe(0);
  });

  it('should resolve when nothing fails', async () => {
    await expect(assertAllAsync(null, [async () => undefined])).resolves.toBeUndefined();
  });
});
