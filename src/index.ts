/**
 * fhe-program-reference
 *
 * Plaintext reference semantics for FHE programs: a fixed-width integer value
 * model, a structured program representation, a capability checker for
 * encrypted/plaintext tags and a deterministic evaluator whose outputs are
 * what a correct homomorphic execution must decrypt to.
 *
 * @module fhe-program-reference
 */

export const version = '0.1.0';

// Errors
export {
  CapabilityViolationError,
  FHEProgramError,
  FHEProgramErrorCode,
  MalformedProgramError,
  TypeMismatchError,
  UnsupportedOperationError,
  describeError,
  isFHEProgramError,
} from './api/errors';

// Value model
export * from './values';

// Program representation
export * from './program';

// Capability checking and evaluation
export * from './checker';
export * from './evaluator';

// Test vectors and examples
export * from './test-vectors';
export * from './programs';

// Ambient
export * from './config';
export * from './telemetry/logger';
