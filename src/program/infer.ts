/**
 * @file program/infer.ts
 * @brief Result-type inference for each opcode
 *
 * Structural problems (arity, missing declared result types, array length
 * mismatches, constant indices out of range) are MalformedProgramError.
 * Operand types the value model does not define an operator for are
 * UnsupportedOperationError.
 */

import { MalformedProgramError, UnsupportedOperationError } from '../api/errors';
import { accumulatorViolation, mulWideViolation } from '../values/arithmetic';
import {
  arrayType,
  formatValueType,
  isIntegerType,
  scalarType,
  type ScalarType,
  type ValueType,
} from '../values/types';
import type { Opcode, Operand, OperationDefinition } from './types';

const ARITY: Record<Opcode, number | 'variadic'> = {
  add: 2,
  sub: 2,
  mul: 2,
  neg: 1,
  and: 2,
  or: 2,
  xor: 2,
  not: 1,
  compare_gt: 2,
  compare_ge: 2,
  compare_lt: 2,
  compare_le: 2,
  compare_eq: 2,
  compare_ne: 2,
  mul_wide: 2,
  cast: 1,
  select: 3,
  index: 2,
  array_add: 2,
  array_sub: 2,
  array_mul: 2,
  array_sum: 1,
  array_pack: 'variadic',
};

export interface InferenceInput {
  readonly operation: OperationDefinition;
  /** Position of the operation in declaration order */
  readonly position: number;
  readonly operandTypes: readonly ValueType[];
}

function location(input: InferenceInput): Record<string, unknown> {
  return { operation: input.position, dest: input.operation.dest, opcode: input.operation.opcode };
}

function unsupported(input: InferenceInput, reason: string): UnsupportedOperationError {
  const { opcode, dest } = input.operation;
  return new UnsupportedOperationError(`${opcode} -> ${dest}: ${reason}`, {
    ...location(input),
    operandTypes: input.operandTypes.map(formatValueType),
  });
}

function malformed(input: InferenceInput, reason: string): MalformedProgramError {
  const { opcode, dest } = input.operation;
  return new MalformedProgramError(`${opcode} -> ${dest}: ${reason}`, location(input));
}

function operandAt(input: InferenceInput, i: number): ValueType {
  const t = input.operandTypes[i];
  if (t === undefined) {
    throw malformed(input, `missing operand ${i}`);
  }
  return t;
}

function scalarOperand(input: InferenceInput, i: number): ScalarType {
  const t = operandAt(input, i);
  if (t.kind !== 'scalar') {
    throw unsupported(input, `operand ${i} must be a scalar, got ${formatValueType(t)}`);
  }
  return t.scalar;
}

function integerOperand(input: InferenceInput, i: number): ScalarType {
  const s = scalarOperand(input, i);
  if (!isIntegerType(s)) {
    throw unsupported(input, `operand ${i} must be an integer, got bool`);
  }
  return s;
}

function sameScalars(input: InferenceInput, a: ScalarType, b: ScalarType): ScalarType {
  if (a !== b) {
    throw unsupported(input, `operands must have identical types, got ${a} and ${b}`);
  }
  return a;
}

function arrayOperand(input: InferenceInput, i: number): { scalar: ScalarType; length: number } {
  const t = operandAt(input, i);
  if (t.kind !== 'array') {
    throw unsupported(input, `operand ${i} must be an array, got ${t.scalar}`);
  }
  return { scalar: t.scalar, length: t.length };
}

function requireDeclaredResult(input: InferenceInput): ScalarType {
  const declared = input.operation.resultType;
  if (declared === undefined) {
    throw malformed(input, 'result type must be declared');
  }
  return declared;
}

function inferUnchecked(input: InferenceInput): ValueType {
  const { opcode } = input.operation;

  switch (opcode) {
    case 'add':
    case 'sub':
    case 'mul':
      return scalarType(sameScalars(input, integerOperand(input, 0), integerOperand(input, 1)));

    case 'neg':
      return scalarType(integerOperand(input, 0));

    case 'and':
    case 'or':
    case 'xor':
      return scalarType(sameScalars(input, scalarOperand(input, 0), scalarOperand(input, 1)));

    case 'not':
      return scalarType(scalarOperand(input, 0));

    case 'compare_gt':
    case 'compare_ge':
    case 'compare_lt':
    case 'compare_le':
    case 'compare_eq':
    case 'compare_ne': {
      const t = sameScalars(input, scalarOperand(input, 0), scalarOperand(input, 1));
      if (t === 'bool' && opcode !== 'compare_eq' && opcode !== 'compare_ne') {
        throw unsupported(input, 'ordering comparisons are not defined on bool');
      }
      return scalarType('bool');
    }

    case 'mul_wide': {
      const result = requireDeclaredResult(input);
      const operand = sameScalars(input, integerOperand(input, 0), integerOperand(input, 1));
      const violation = mulWideViolation(operand, result);
      if (violation !== undefined) throw unsupported(input, violation);
      return scalarType(result);
    }

    case 'cast':
      scalarOperand(input, 0);
      return scalarType(requireDeclaredResult(input));

    case 'select': {
      const condition = scalarOperand(input, 0);
      if (condition !== 'bool') {
        throw unsupported(input, `select condition must be bool, got ${condition}`);
      }
      return scalarType(sameScalars(input, scalarOperand(input, 1), scalarOperand(input, 2)));
    }

    case 'index': {
      const arr = arrayOperand(input, 0);
      integerOperand(input, 1);
      checkConstantIndex(input, arr.length);
      return scalarType(arr.scalar);
    }

    case 'array_add':
    case 'array_sub':
    case 'array_mul': {
      const a = arrayOperand(input, 0);
      const b = arrayOperand(input, 1);
      if (a.length !== b.length) {
        throw malformed(input, `element-wise operands have different lengths (${a.length} and ${b.length})`);
      }
      const element = sameScalars(input, a.scalar, b.scalar);
      if (!isIntegerType(element)) {
        throw unsupported(input, 'element-wise arithmetic is not defined on bool');
      }
      return arrayType(element, a.length);
    }

    case 'array_sum': {
      const result = requireDeclaredResult(input);
      const arr = arrayOperand(input, 0);
      const violation = accumulatorViolation(arr.scalar, result);
      if (violation !== undefined) throw unsupported(input, violation);
      return scalarType(result);
    }

    case 'array_pack': {
      if (input.operandTypes.length === 0) {
        throw malformed(input, 'array_pack needs at least one element');
      }
      let element = scalarOperand(input, 0);
      for (let i = 1; i < input.operandTypes.length; i++) {
        element = sameScalars(input, element, scalarOperand(input, i));
      }
      return arrayType(element, input.operandTypes.length);
    }
  }
}

function checkConstantIndex(input: InferenceInput, length: number): void {
  const operand: Operand | undefined = input.operation.operands[1];
  if (operand === undefined || operand.kind !== 'const' || operand.value.kind !== 'integer') return;
  const index = operand.value.value;
  if (index < 0n || index >= BigInt(length)) {
    throw malformed(input, `constant index ${index} is out of range for length ${length}`);
  }
}

/**
 * Infer the result type of one operation from its operand types
 */
export function inferResultType(input: InferenceInput): ValueType {
  const { opcode, operands, resultType } = input.operation;

  const arity = ARITY[opcode];
  if (arity !== 'variadic' && operands.length !== arity) {
    throw malformed(input, `expected ${arity} operand(s), got ${operands.length}`);
  }

  const inferred = inferUnchecked(input);

  // For opcodes that infer their own type, a declared type is an assertion
  if (resultType !== undefined && inferred.scalar !== resultType) {
    throw malformed(input, `declared result type ${resultType} does not match ${formatValueType(inferred)}`);
  }
  return inferred;
}
