/**
 * @file values/arithmetic.ts
 * @brief Fixed-width arithmetic, comparison and array operators
 *
 * Arithmetic matches unchecked two's-complement hardware: results wrap
 * modulo 2^width and overflow is never an error. Operands of binary
 * operators must have identical types; widening is always explicit
 * (mulWide, cast, arraySum with a declared result type).
 */

import { UnsupportedOperationError } from '../api/errors';
import { bool, wrapInteger } from './construct';
import {
  bitWidthOf,
  isIntegerType,
  isSigned,
  type ArrayValue,
  type BooleanValue,
  type IntegerType,
  type IntegerValue,
  type ScalarType,
  type ScalarValue,
  type Value,
} from './types';

export type ArithmeticOp = 'add' | 'sub' | 'mul';
export type BitwiseOp = 'and' | 'or' | 'xor';
export type ComparisonOp = 'gt' | 'ge' | 'lt' | 'le' | 'eq' | 'ne';

// ============================================================================
// Operand Guards
// ============================================================================

function requireScalar(op: string, value: Value): ScalarValue {
  if (value.kind === 'array') {
    throw new UnsupportedOperationError(`${op} is not defined on arrays`, { op });
  }
  return value;
}

function requireInteger(op: string, value: Value): IntegerValue {
  const s = requireScalar(op, value);
  if (s.kind !== 'integer') {
    throw new UnsupportedOperationError(`${op} is not defined on bool`, { op });
  }
  return s;
}

function requireArray(op: string, value: Value): ArrayValue {
  if (value.kind !== 'array') {
    throw new UnsupportedOperationError(`${op} expects an array, got ${value.type}`, { op });
  }
  return value;
}

function requireSameIntegers(op: string, a: Value, b: Value): [IntegerValue, IntegerValue] {
  const x = requireInteger(op, a);
  const y = requireInteger(op, b);
  if (x.type !== y.type) {
    throw new UnsupportedOperationError(`${op} requires identical operand types, got ${x.type} and ${y.type}`, {
      op,
      left: x.type,
      right: y.type,
    });
  }
  return [x, y];
}

// ============================================================================
// Widening Rules
// ============================================================================

/**
 * Why a widening multiply from `operand` into `result` is not allowed, or
 * undefined when the result holds every product without wraparound
 */
export function mulWideViolation(operand: ScalarType, result: ScalarType): string | undefined {
  if (!isIntegerType(operand) || !isIntegerType(result)) {
    return 'mul_wide is only defined on integers';
  }
  if (isSigned(operand) !== isSigned(result)) {
    return `mul_wide cannot change signedness (${operand} to ${result})`;
  }
  if (bitWidthOf(result) < 2 * bitWidthOf(operand)) {
    return `mul_wide result ${result} is narrower than twice ${operand}`;
  }
  return undefined;
}

/**
 * Why summing `element` values into a `result` accumulator is not allowed
 */
export function accumulatorViolation(element: ScalarType, result: ScalarType): string | undefined {
  if (!isIntegerType(element) || !isIntegerType(result)) {
    return 'array_sum is only defined on integers';
  }
  if (isSigned(element) !== isSigned(result)) {
    return `array_sum cannot change signedness (${element} to ${result})`;
  }
  if (bitWidthOf(result) < bitWidthOf(element)) {
    return `array_sum accumulator ${result} is narrower than ${element}`;
  }
  return undefined;
}

// ============================================================================
// Scalar Arithmetic
// ============================================================================

export function arithmetic(op: ArithmeticOp, a: Value, b: Value): IntegerValue {
  const [x, y] = requireSameIntegers(op, a, b);
  switch (op) {
    case 'add':
      return wrapInteger(x.type, x.value + y.value);
    case 'sub':
      return wrapInteger(x.type, x.value - y.value);
    case 'mul':
      return wrapInteger(x.type, x.value * y.value);
  }
}

export const add = (a: Value, b: Value): IntegerValue => arithmetic('add', a, b);
export const sub = (a: Value, b: Value): IntegerValue => arithmetic('sub', a, b);
export const mul = (a: Value, b: Value): IntegerValue => arithmetic('mul', a, b);

export function neg(a: Value): IntegerValue {
  const x = requireInteger('neg', a);
  return wrapInteger(x.type, -x.value);
}

/**
 * Multiply into an explicitly declared wider type (e.g. u8 × u8 → u16)
 */
export function mulWide(a: Value, b: Value, result: IntegerType): IntegerValue {
  const [x, y] = requireSameIntegers('mul_wide', a, b);
  const violation = mulWideViolation(x.type, result);
  if (violation !== undefined) {
    throw new UnsupportedOperationError(violation, { op: 'mul_wide', operand: x.type, result });
  }
  return wrapInteger(result, x.value * y.value);
}

// ============================================================================
// Bitwise / Logical
// ============================================================================

export function bitwise(op: BitwiseOp, a: Value, b: Value): ScalarValue {
  const x = requireScalar(op, a);
  const y = requireScalar(op, b);

  if (x.kind === 'boolean' && y.kind === 'boolean') {
    switch (op) {
      case 'and':
        return bool(x.value && y.value);
      case 'or':
        return bool(x.value || y.value);
      case 'xor':
        return bool(x.value !== y.value);
    }
  }

  const [p, q] = requireSameIntegers(op, x, y);
  switch (op) {
    case 'and':
      return wrapInteger(p.type, p.value & q.value);
    case 'or':
      return wrapInteger(p.type, p.value | q.value);
    case 'xor':
      return wrapInteger(p.type, p.value ^ q.value);
  }
}

export function bitNot(a: Value): ScalarValue {
  const x = requireScalar('not', a);
  if (x.kind === 'boolean') return bool(!x.value);
  return wrapInteger(x.type, ~x.value);
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Compare two scalars of identical type. Signed values already carry their
 * two's-complement numeric value, so ordering is numeric in both cases.
 */
export function compare(op: ComparisonOp, a: Value, b: Value): BooleanValue {
  const label = `compare_${op}`;
  const x = requireScalar(label, a);
  const y = requireScalar(label, b);

  if (x.type !== y.type) {
    throw new UnsupportedOperationError(`${label} requires identical operand types, got ${x.type} and ${y.type}`, {
      op: label,
      left: x.type,
      right: y.type,
    });
  }

  if (x.kind === 'boolean' || y.kind === 'boolean') {
    if (op === 'eq') return bool(x.value === y.value);
    if (op === 'ne') return bool(x.value !== y.value);
    throw new UnsupportedOperationError(`${label} is not defined on bool`, { op: label });
  }

  switch (op) {
    case 'gt':
      return bool(x.value > y.value);
    case 'ge':
      return bool(x.value >= y.value);
    case 'lt':
      return bool(x.value < y.value);
    case 'le':
      return bool(x.value <= y.value);
    case 'eq':
      return bool(x.value === y.value);
    case 'ne':
      return bool(x.value !== y.value);
  }
}

export const compareGt = (a: Value, b: Value): BooleanValue => compare('gt', a, b);
export const compareGe = (a: Value, b: Value): BooleanValue => compare('ge', a, b);
export const compareLt = (a: Value, b: Value): BooleanValue => compare('lt', a, b);
export const compareLe = (a: Value, b: Value): BooleanValue => compare('le', a, b);
export const compareEq = (a: Value, b: Value): BooleanValue => compare('eq', a, b);
export const compareNe = (a: Value, b: Value): BooleanValue => compare('ne', a, b);

// ============================================================================
// Conversion and Selection
// ============================================================================

/**
 * Fixed-width conversion: truncation or sign/zero extension between
 * integers, `!= 0` into bool, 0/1 out of bool
 */
export function cast(a: Value, target: ScalarType): ScalarValue {
  const x = requireScalar('cast', a);
  if (!isIntegerType(target)) {
    return x.kind === 'boolean' ? x : bool(x.value !== 0n);
  }
  if (x.kind === 'boolean') {
    return wrapInteger(target, x.value ? 1n : 0n);
  }
  return wrapInteger(target, x.value);
}

export function select(condition: Value, whenTrue: Value, whenFalse: Value): Value {
  const c = requireScalar('select', condition);
  if (c.kind !== 'boolean') {
    throw new UnsupportedOperationError(`select condition must be bool, got ${c.type}`, { op: 'select' });
  }
  const t = requireScalar('select', whenTrue);
  const f = requireScalar('select', whenFalse);
  if (t.type !== f.type) {
    throw new UnsupportedOperationError(`select requires identical branch types, got ${t.type} and ${f.type}`, {
      op: 'select',
    });
  }
  return c.value ? t : f;
}

// ============================================================================
// Arrays
// ============================================================================

export function arrayElementwise(op: ArithmeticOp, a: Value, b: Value): ArrayValue {
  const label = `array_${op}`;
  const x = requireArray(label, a);
  const y = requireArray(label, b);
  if (x.elements.length !== y.elements.length) {
    throw new UnsupportedOperationError(
      `${label} requires equal lengths, got ${x.elements.length} and ${y.elements.length}`,
      { op: label }
    );
  }
  if (x.elementType !== y.elementType) {
    throw new UnsupportedOperationError(
      `${label} requires identical element types, got ${x.elementType} and ${y.elementType}`,
      { op: label }
    );
  }
  const elements = x.elements.map((e, i) => {
    const other = y.elements[i];
    if (other === undefined) {
      throw new UnsupportedOperationError(`${label} missing element ${i}`, { op: label });
    }
    return arithmetic(op, e, other);
  });
  return { kind: 'array', elementType: x.elementType, elements: Object.freeze(elements) };
}

/**
 * Sum all elements into an accumulator of the declared type, starting at 0
 * and wrapping at the accumulator's width after every step
 */
export function arraySum(a: Value, result: IntegerType): IntegerValue {
  const x = requireArray('array_sum', a);
  const violation = accumulatorViolation(x.elementType, result);
  if (violation !== undefined) {
    throw new UnsupportedOperationError(violation, { op: 'array_sum', element: x.elementType, result });
  }
  let acc = wrapInteger(result, 0n);
  for (const element of x.elements) {
    const e = requireInteger('array_sum', element);
    acc = wrapInteger(result, acc.value + e.value);
  }
  return acc;
}

export function arrayIndex(a: Value, index: Value): ScalarValue {
  const x = requireArray('index', a);
  const i = requireInteger('index', index);
  const element = i.value >= 0n && i.value < BigInt(x.elements.length) ? x.elements[Number(i.value)] : undefined;
  if (element === undefined) {
    throw new UnsupportedOperationError(`index ${i.value} is out of range for length ${x.elements.length}`, {
      op: 'index',
      index: i.value.toString(),
      length: x.elements.length,
    });
  }
  return element;
}

export function arrayPack(elementType: ScalarType, elements: readonly Value[]): ArrayValue {
  const scalars = elements.map((e) => {
    const s = requireScalar('array_pack', e);
    if (s.type !== elementType) {
      throw new UnsupportedOperationError(`array_pack expects ${elementType} elements, got ${s.type}`, {
        op: 'array_pack',
      });
    }
    return s;
  });
  return { kind: 'array', elementType, elements: Object.freeze(scalars) };
}
