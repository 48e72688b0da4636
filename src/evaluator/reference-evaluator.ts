/**
 * @file evaluator/reference-evaluator.ts
 * @brief Pure plaintext interpretation of checked programs
 *
 * The outputs produced here are what a correct homomorphic execution of the
 * same program must decrypt to. Evaluation reads the program, allocates its
 * own result storage per call and never writes to shared state, so one
 * CheckedProgram may be evaluated any number of times, concurrently.
 */

import { CapabilityViolationError, TypeMismatchError, UnsupportedOperationError } from '../api/errors';
import { isIssuedCheck, type CheckedProgram } from '../checker/capability-checker';
import type { ResolvedOperation } from '../program/program';
import type { Operand } from '../program/types';
import { silentLogger, type Logger } from '../telemetry/logger';
import {
  arithmetic,
  arrayElementwise,
  arrayIndex,
  arrayPack,
  arraySum,
  bitNot,
  bitwise,
  cast,
  compare,
  mulWide,
  neg,
  select,
} from '../values/arithmetic';
import { describeValueMismatch } from '../values/construct';
import { formatValueType, isIntegerType, type IntegerType, type Value } from '../values/types';

export type EvaluationInputs = ReadonlyMap<string, Value> | Readonly<Record<string, Value>>;

export type EvaluationError = TypeMismatchError | UnsupportedOperationError | CapabilityViolationError;

export type EvaluationResult =
  | { readonly ok: true; readonly outputs: ReadonlyMap<string, Value> }
  | { readonly ok: false; readonly error: EvaluationError };

export interface EvaluateOptions {
  logger?: Logger;
}

// ============================================================================
// Input Binding
// ============================================================================

function isInputMap(inputs: EvaluationInputs): inputs is ReadonlyMap<string, Value> {
  return inputs instanceof Map;
}

/**
 * Copy inputs given either as a Map or as a plain record into a fresh Map
 */
export function toInputMap(inputs: EvaluationInputs): Map<string, Value> {
  if (isInputMap(inputs)) {
    return new Map(inputs);
  }
  return new Map(Object.entries(inputs));
}

/**
 * Check supplied inputs against the declared parameters and bind them into
 * fresh per-call storage
 */
function bindInputs(checked: CheckedProgram, inputs: EvaluationInputs): Map<string, Value> {
  const { program } = checked;
  const env = new Map<string, Value>();

  for (const [name, value] of toInputMap(inputs)) {
    const param = program.parameter(name);
    if (param === undefined) {
      throw new TypeMismatchError(`Unexpected input ${name}: ${program.name} has no such parameter`, { name });
    }
    const expected = program.typeOf(name);
    if (expected === undefined) {
      throw new TypeMismatchError(`Parameter ${name} has no declared type`, { name });
    }
    const mismatch = describeValueMismatch(value, expected);
    if (mismatch !== undefined) {
      throw new TypeMismatchError(`Input ${name}: ${mismatch}`, { name, expected: formatValueType(expected) });
    }
    env.set(name, value);
  }

  for (const param of program.parameters) {
    if (!env.has(param.name)) {
      throw new TypeMismatchError(`Missing input for parameter ${param.name}`, { name: param.name });
    }
  }

  return env;
}

// ============================================================================
// Operation Dispatch
// ============================================================================

function resolveOperand(env: ReadonlyMap<string, Value>, operand: Operand): Value {
  if (operand.kind === 'const') return operand.value;
  const value = env.get(operand.name);
  if (value === undefined) {
    throw new UnsupportedOperationError(`No value bound to ${operand.name}`, { name: operand.name });
  }
  return value;
}

function operandAt(values: readonly Value[], i: number, op: ResolvedOperation): Value {
  const v = values[i];
  if (v === undefined) {
    throw new UnsupportedOperationError(`${op.opcode} -> ${op.dest}: missing operand ${i}`, {
      operation: op.position,
    });
  }
  return v;
}

function declaredIntegerResult(op: ResolvedOperation): IntegerType {
  const t = op.resultType;
  if (t === undefined || !isIntegerType(t)) {
    throw new UnsupportedOperationError(`${op.opcode} -> ${op.dest}: needs an integer result type`, {
      operation: op.position,
    });
  }
  return t;
}

export function executeOperation(op: ResolvedOperation, operands: readonly Value[]): Value {
  const a = (): Value => operandAt(operands, 0, op);
  const b = (): Value => operandAt(operands, 1, op);

  switch (op.opcode) {
    case 'add':
    case 'sub':
    case 'mul':
      return arithmetic(op.opcode, a(), b());
    case 'neg':
      return neg(a());
    case 'and':
    case 'or':
    case 'xor':
      return bitwise(op.opcode, a(), b());
    case 'not':
      return bitNot(a());
    case 'compare_gt':
      return compare('gt', a(), b());
    case 'compare_ge':
      return compare('ge', a(), b());
    case 'compare_lt':
      return compare('lt', a(), b());
    case 'compare_le':
      return compare('le', a(), b());
    case 'compare_eq':
      return compare('eq', a(), b());
    case 'compare_ne':
      return compare('ne', a(), b());
    case 'mul_wide':
      return mulWide(a(), b(), declaredIntegerResult(op));
    case 'cast': {
      const target = op.resultType;
      if (target === undefined) {
        throw new UnsupportedOperationError(`cast -> ${op.dest}: needs a result type`, { operation: op.position });
      }
      return cast(a(), target);
    }
    case 'select':
      return select(a(), b(), operandAt(operands, 2, op));
    case 'index':
      return arrayIndex(a(), b());
    case 'array_add':
      return arrayElementwise('add', a(), b());
    case 'array_sub':
      return arrayElementwise('sub', a(), b());
    case 'array_mul':
      return arrayElementwise('mul', a(), b());
    case 'array_sum':
      return arraySum(a(), declaredIntegerResult(op));
    case 'array_pack':
      return arrayPack(op.type.scalar, operands);
  }
}

function run(checked: CheckedProgram, inputs: EvaluationInputs): Map<string, Value> {
  const { program } = checked;
  const env = bindInputs(checked, inputs);

  for (const op of program.operations) {
    const operands = op.operands.map((operand) => resolveOperand(env, operand));
    env.set(op.dest, executeOperation(op, operands));
  }

  const outputs = new Map<string, Value>();
  for (const out of program.outputs) {
    outputs.set(out.name, resolveOperand(env, { kind: 'ref', name: out.source }));
  }
  return outputs;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Evaluate a checked program against concrete inputs
 *
 * Returns every declared output, in declaration order, or the first error.
 * No partial results are returned.
 *
 * @example
 * ```typescript
 * const checked = assertChecked(program);
 * const result = evaluate(checked, { a: u8(255), b: u8(1) });
 * if (result.ok) result.outputs.get('out'); // 0u8
 * ```
 */
export function evaluate(
  checked: CheckedProgram,
  inputs: EvaluationInputs,
  options: EvaluateOptions = {}
): EvaluationResult {
  const logger = options.logger ?? silentLogger;
  const started = Date.now();

  if (!isIssuedCheck(checked)) {
    const error = new CapabilityViolationError(
      `Program ${checked.program.name} was not accepted by the capability checker`,
      { program: checked.program.name }
    );
    logger.debug(`Refusing to evaluate ${checked.program.name}`, { message: error.message });
    return { ok: false, error };
  }

  try {
    const outputs = run(checked, inputs);
    logger.debug(`Evaluated ${checked.program.name}`, {
      operations: checked.program.operations.length,
      elapsedMs: Date.now() - started,
    });
    return { ok: true, outputs };
  } catch (error) {
    if (error instanceof TypeMismatchError || error instanceof UnsupportedOperationError) {
      logger.debug(`Evaluation of ${checked.program.name} failed`, { code: error.code, message: error.message });
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Same as evaluate but throws the failure
 */
export function evaluateOrThrow(
  checked: CheckedProgram,
  inputs: EvaluationInputs,
  options: EvaluateOptions = {}
): ReadonlyMap<string, Value> {
  const result = evaluate(checked, inputs, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.outputs;
}

/**
 * Evaluate several independent input sets; each gets its own storage
 */
export function evaluateBatch(
  checked: CheckedProgram,
  inputSets: readonly EvaluationInputs[],
  options: EvaluateOptions = {}
): EvaluationResult[] {
  return inputSets.map((inputs) => evaluate(checked, inputs, options));
}
