/**
 * @file checker/capability-checker.ts
 * @brief Static encryption-tag propagation pass
 *
 * Rules:
 * - a result is encrypted if any of its operands is encrypted (constants
 *   are plaintext); an operation may declare `encrypted` to promote a
 *   plaintext result but never `plaintext` on an encrypted one
 * - a plaintext output may only surface a value with no encrypted provenance
 * - array indices must be plaintext; encrypted indexing is not representable
 *
 * The pass runs once per Program and its outcome is kept on the program.
 * Only a passing check yields a CheckedProgram, which is the sole input the
 * evaluator accepts.
 */

import {
  CapabilityViolationError,
  MalformedProgramError,
  UnsupportedOperationError,
} from '../api/errors';
import { createProgram, Program } from '../program/program';
import type { Operand, ProgramDefinition, Tag } from '../program/types';
import { silentLogger, type Logger } from '../telemetry/logger';

// ============================================================================
// Violations
// ============================================================================

export enum CapabilityViolation {
  ENCRYPTION_DROPPED = 'ENCRYPTION_DROPPED',
  PLAINTEXT_OUTPUT_FROM_ENCRYPTED = 'PLAINTEXT_OUTPUT_FROM_ENCRYPTED',
  ENCRYPTED_INDEX = 'ENCRYPTED_INDEX',
}

export interface CapabilityViolationInfo {
  code: CapabilityViolation;
  message: string;
  /** Operation position, for operation-level violations */
  operation?: number;
  /** Output name, for output-level violations */
  output?: string;
  /** Name of the offending destination or output source */
  name: string;
}

export interface CapabilityAnalysis {
  /** Effective tag of every parameter and operation result */
  tags: ReadonlyMap<string, Tag>;
  violations: CapabilityViolationInfo[];
}

// ============================================================================
// Checked Program
// ============================================================================

/**
 * A program that passed the capability check
 */
export interface CheckedProgram {
  readonly __brand: 'CheckedProgram';
  readonly program: Program;
  readonly tags: ReadonlyMap<string, Tag>;
}

/** Unsupported operand combinations are found while constructing a definition, so they surface here too */
export type CheckError = MalformedProgramError | CapabilityViolationError | UnsupportedOperationError;

export type CheckResult =
  | { readonly ok: true; readonly program: CheckedProgram }
  | { readonly ok: false; readonly error: CheckError };

// Only checks issued by runCheck are accepted by the evaluator
const issued = new WeakSet<CheckedProgram>();

/**
 * Whether this value came out of a passing capability check
 */
export function isIssuedCheck(checked: CheckedProgram): boolean {
  return issued.has(checked);
}

export interface CheckOptions {
  logger?: Logger;
}

// ============================================================================
// Analysis
// ============================================================================

function joinTags(tags: readonly Tag[]): Tag {
  return tags.includes('encrypted') ? 'encrypted' : 'plaintext';
}

/**
 * Compute effective tags and collect every violation in declaration order
 */
export function analyzeCapabilities(program: Program): CapabilityAnalysis {
  const tags = new Map<string, Tag>();
  const violations: CapabilityViolationInfo[] = [];

  for (const p of program.parameters) {
    tags.set(p.name, p.tag);
  }

  const tagOfOperand = (operand: Operand): Tag =>
    operand.kind === 'const' ? 'plaintext' : tags.get(operand.name) ?? 'plaintext';

  for (const op of program.operations) {
    const operandTags = op.operands.map(tagOfOperand);

    if (op.opcode === 'index') {
      const indexOperand = op.operands[1];
      if (indexOperand !== undefined && tagOfOperand(indexOperand) === 'encrypted') {
        violations.push({
          code: CapabilityViolation.ENCRYPTED_INDEX,
          message: `Operation ${op.position} (${op.dest}) indexes with an encrypted index`,
          operation: op.position,
          name: op.dest,
        });
      }
    }

    const derived = joinTags(operandTags);
    if (op.tag === 'plaintext' && derived === 'encrypted') {
      violations.push({
        code: CapabilityViolation.ENCRYPTION_DROPPED,
        message: `Operation ${op.position} (${op.dest}) is declared plaintext but depends on encrypted data`,
        operation: op.position,
        name: op.dest,
      });
    }

    tags.set(op.dest, op.tag === 'encrypted' ? 'encrypted' : derived);
  }

  for (const out of program.outputs) {
    const sourceTag = tags.get(out.source) ?? 'plaintext';
    if (out.tag === 'plaintext' && sourceTag === 'encrypted') {
      violations.push({
        code: CapabilityViolation.PLAINTEXT_OUTPUT_FROM_ENCRYPTED,
        message: `Output ${out.name} is declared plaintext but ${out.source} is encrypted`,
        output: out.name,
        name: out.source,
      });
    }
  }

  return { tags, violations };
}

export function collectCapabilityViolations(program: Program): CapabilityViolationInfo[] {
  return analyzeCapabilities(program).violations;
}

function runCheck(program: Program): CheckResult {
  const { tags, violations } = analyzeCapabilities(program);
  const first = violations[0];
  if (first !== undefined) {
    return {
      ok: false,
      error: new CapabilityViolationError(first.message, {
        program: program.name,
        violation: first,
        violations,
      }),
    };
  }
  const checked: CheckedProgram = Object.freeze({
    __brand: 'CheckedProgram' as const,
    program,
    tags,
  });
  issued.add(checked);
  return { ok: true, program: checked };
}

function construct(definition: ProgramDefinition): Program | CheckError {
  try {
    return createProgram(definition);
  } catch (error) {
    if (error instanceof MalformedProgramError || error instanceof UnsupportedOperationError) {
      return error;
    }
    throw error;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Check a program's capability rules. A definition is constructed first, so
 * construction errors are reported through the same result.
 *
 * @example
 * ```typescript
 * const result = checkProgram(program);
 * if (!result.ok) throw result.error;
 * const outputs = evaluate(result.program, { a: u8(1), b: u8(2) });
 * ```
 */
export function checkProgram(input: Program | ProgramDefinition, options: CheckOptions = {}): CheckResult {
  const logger = options.logger ?? silentLogger;

  const program = input instanceof Program ? input : construct(input);
  if (!(program instanceof Program)) {
    logger.debug(`Program ${input.name} failed construction`, { code: program.code, message: program.message });
    return { ok: false, error: program };
  }

  if (program.isChecked) {
    logger.debug(`Reusing capability check for ${program.name}`);
  }

  const result = program.memoizeCheck(runCheck);
  if (result.ok) {
    logger.debug(`Program ${program.name} passed capability check`, {
      parameters: program.parameters.length,
      operations: program.operations.length,
      outputs: program.outputs.length,
    });
  } else {
    logger.debug(`Program ${program.name} failed capability check`, { message: result.error.message });
  }
  return result;
}

/**
 * Same as checkProgram but throws the failure
 */
export function assertChecked(input: Program | ProgramDefinition, options: CheckOptions = {}): CheckedProgram {
  const result = checkProgram(input, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.program;
}
