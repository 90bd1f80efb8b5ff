/**
 * Contract Verification Module
 *
 * Reusable checks for the identity, ordering and equivalence contracts of a
 * type, offered in two forms with the same verdicts: composable `Check`
 * values, and `assert*` functions that throw on failure.
 *
 * @example
 * ```typescript
 * import { assertObjectInvariants, equatableTraits, matches, satisfiesObjectInvariants } from 'contract-assertions';
 *
 * const traits = equatableTraits<Money>();
 * assertObjectInvariants(new Money(5, 'EUR'), traits);
 * matches(new Money(5, 'EUR'), satisfiesObjectInvariants(traits)); // true
 * ```
 */

export {
  createCheck,
  selfRelationship,
  pairRelationship,
  tripleRelationship,
  allOf,
  describedAs,
  matches,
  assertThat,
  assertTrue,
  satisfies,
  hasRelationship,
  methodDoesNotThrow,
  methodThrows,
  feature,
  featuresHaveRelationship,
} from './check.js';
export type {
  Predicate,
  SelfPredicate,
  PairPredicate,
  TriplePredicate,
  ErrorClass,
} from './check.js';
export { Description } from './description.js';
export {
  attempt,
  safeEquals,
  safeCompare,
  safeHash,
  safeToString,
  identityString,
  describeThrown,
} from './safe.js';
export type { Attempt } from './safe.js';
export { valueEquals, equatableTraits, comparableTraits } from './traits.js';
export {
  toStringDoesNotThrow,
  hashDoesNotThrow,
  equalsSelf,
  neverEqualsNothing,
  equalityIsSymmetric,
  hashIsConsistentWithEquals,
  satisfiesObjectInvariants,
  satisfiesObjectInvariantsWith,
  assertObjectInvariants,
  assertObjectInvariantsWith,
} from './identity-contract.js';
export {
  compareToNothingThrows,
  compareToSelfDoesNotThrow,
  compareIsAntisymmetric,
  compareIsTransitive,
  orderingIsConsistentWithEqualsWith,
  satisfiesOrderingInvariants,
  satisfiesOrderingInvariantsWith,
  satisfiesOrderingInvariantsWith2,
  assertOrderingInvariants,
  assertOrderingInvariantsWith,
  assertOrderingInvariantsWith2,
  assertOrderingConsistentWithEquals,
} from './ordering-contract.js';
export type { PairwiseOrderingOptions } from './ordering-contract.js';
export {
  hasEntitySemanticsWith,
  hasValueSemanticsWith,
  assertEntitySemantics,
  assertValueSemantics,
} from './equivalence-semantics.js';
export {
  assertAll,
  assertAllAsync,
  assertForAllElements,
  toFailure,
  DEFAULT_HEADING,
} from './assert-all.js';
export type {
  CheckOutcome,
  Check,
  Describer,
  Accessor,
  Verifier,
  Operation,
  EqualityTraits,
  OrderingTraits,
  ValueEquality,
  Equatable,
  Comparable,
} from './types.js';
