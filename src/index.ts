/**
 * contract-assertions
 * Contract checks for equality, ordering and equivalence semantics, an
 * aggregating assertion executor, and a harness for concurrent workers.
 *
 * @example
 * ```typescript
 * import { assertAll, assertOrderingInvariantsWith, comparableTraits } from 'contract-assertions';
 *
 * const traits = comparableTraits<Version>();
 * assertAll('versions',
 *   () => assertOrderingInvariantsWith(v1, v2, traits),
 *   () => assertOrderingInvariantsWith(v2, v3, traits),
 * );
 * ```
 */

// Core
export { ConfigManager, getConfig, setConfig, resetConfig, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  ContractError,
  UsageError,
  InvariantViolationError,
  WorkerFaultError,
  UnrecoverableError,
  ConfigError,
  MultipleFailuresError,
  isUnrecoverable,
  requirePresent,
} from './core/errors.js';
export { FailureCollector, type FailureSummary } from './core/error-chain.js';
export { ContractConfigSchema, LOG_LEVELS } from './core/types.js';
export type { ContractConfig, LogLevel } from './core/types.js';

// Verification
export * from './verification/index.js';

// Concurrency
export * from './concurrency/index.js';
