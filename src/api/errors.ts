/**
 * @file api/errors.ts
 * @brief Error taxonomy for program construction, checking and evaluation
 *
 * Every failure raised by the library is an FHEProgramError carrying a
 * machine-readable code. None of them are retried internally; the caller
 * (a test harness or a compiler-equivalence checker) decides what a failure
 * means.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum FHEProgramErrorCode {
  MALFORMED_PROGRAM = 'MALFORMED_PROGRAM',
  CAPABILITY_VIOLATION = 'CAPABILITY_VIOLATION',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',
}

// ============================================================================
// Error Classes
// ============================================================================

export class FHEProgramError extends Error {
  constructor(
    message: string,
    public readonly code: FHEProgramErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FHEProgramError';
    Object.setPrototypeOf(this, FHEProgramError.prototype);
  }
}

/**
 * Structural problem found while constructing a program: undefined or
 * forward references, duplicate names, array length mismatches, bad outputs.
 */
export class MalformedProgramError extends FHEProgramError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, FHEProgramErrorCode.MALFORMED_PROGRAM, details);
    this.name = 'MalformedProgramError';
    Object.setPrototypeOf(this, MalformedProgramError.prototype);
  }
}

/**
 * Tag-propagation rule broken: encryption dropped, or an encrypted value
 * used where only plaintext is representable.
 */
export class CapabilityViolationError extends FHEProgramError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, FHEProgramErrorCode.CAPABILITY_VIOLATION, details);
    this.name = 'CapabilityViolationError';
    Object.setPrototypeOf(this, CapabilityViolationError.prototype);
  }
}

/** Input value shape, width or range differs from its declaration */
export class TypeMismatchError extends FHEProgramError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, FHEProgramErrorCode.TYPE_MISMATCH, details);
    this.name = 'TypeMismatchError';
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

/** Opcode or operand-type combination the value model does not define */
export class UnsupportedOperationError extends FHEProgramError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, FHEProgramErrorCode.UNSUPPORTED_OPERATION, details);
    this.name = 'UnsupportedOperationError';
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}

export function isFHEProgramError(error: unknown): error is FHEProgramError {
  return error instanceof FHEProgramError;
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof FHEProgramError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
