export class ContractError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ContractError';
  }
}

/** Invalid arguments to a check. Raised immediately, never aggregated. */
export class UsageError extends ContractError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

/** The object under test breaks a contract. */
export class InvariantViolationError extends ContractError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVARIANT_VIOLATION', cause);
    this.name = 'InvariantViolationError';
  }
}

/** A worker threw something that is not an Error instance. */
export class WorkerFaultError extends ContractError {
  constructor(message: string, public readonly workerId: string, cause: unknown) {
    super(message, 'WORKER_FAULT', cause);
    this.name = 'WorkerFaultError';
  }
}

/**
 * The test process itself is compromised. Never caught, converted or
 * aggregated by any checking layer.
 */
export class UnrecoverableError extends ContractError {
  constructor(message: string, cause?: unknown) {
    super(message, 'UNRECOVERABLE', cause);
    this.name = 'UnrecoverableError';
  }
}

export class ConfigError extends ContractError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class MultipleFailuresError extends ContractError {
  readonly primary: Error;

  constructor(
    public readonly heading: string,
    public readonly failures: readonly Error[],
  ) {
    super(formatMultipleFailures(heading, failures), 'MULTIPLE_FAILURES', failures[0]);
    this.name = 'MultipleFailuresError';
    this.primary = failures[0];
  }
}

// V8 reports heap exhaustion it survives as one of these RangeErrors.
const MEMORY_EXHAUSTION_MESSAGES = [
  'Array buffer allocation failed',
  'Invalid string length',
  'out of memory',
];

export function isUnrecoverable(value: unknown): boolean {
  if (value instanceof UnrecoverableError) return true;
  if (value instanceof RangeError) {
    return MEMORY_EXHAUSTION_MESSAGES.some(m => value.message.includes(m));
  }
  return false;
}

/**
 * Guard for required operands: null and undefined are usage errors.
 */
export function requirePresent<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new UsageError(`${name} must not be null`);
  }
  return value;
}

function formatMultipleFailures(heading: string, failures: readonly Error[]): string {
  const n = failures.length;
  const lines = failures.map(f => {
    const message = f.message.trim() === '' ? `<no message> in ${f.name}` : f.message;
    return `\n\t${message}`;
  });
  return `${heading} (${n} failure${n === 1 ? '' : 's'})${lines.join('')}`;
}
