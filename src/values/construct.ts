/**
 * @file values/construct.ts
 * @brief Value constructors, shape checks and formatting
 */

import { TypeMismatchError } from '../api/errors';
import {
  bitWidthOf,
  fitsIn,
  formatValueType,
  isIntegerType,
  isSigned,
  maxValue,
  minValue,
  signedToUnsigned,
  unsignedToSigned,
  type ArrayValue,
  type BooleanValue,
  type IntegerType,
  type IntegerValue,
  type ScalarType,
  type ScalarValue,
  type Value,
  type ValueType,
} from './types';

function toBigInt(type: IntegerType, value: bigint | number): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new TypeMismatchError(`${String(value)} is not an exact integer for ${type}`, { type, value });
  }
  return BigInt(value);
}

/**
 * Create an integer value, rejecting anything outside the type's range
 */
export function integer(type: IntegerType, value: bigint | number): IntegerValue {
  const v = toBigInt(type, value);
  if (!fitsIn(type, v)) {
    throw new TypeMismatchError(
      `${v} is out of range for ${type} (${minValue(type)}..${maxValue(type)})`,
      { type, value: v.toString() }
    );
  }
  return { kind: 'integer', type, value: v };
}

/**
 * Reduce an arbitrary integer into the type's range (wraparound)
 */
export function wrapInteger(type: IntegerType, value: bigint): IntegerValue {
  const bits = bitWidthOf(type);
  const wrapped = isSigned(type) ? unsignedToSigned(bits, value) : signedToUnsigned(bits, value);
  return { kind: 'integer', type, value: wrapped };
}

export const u8 = (value: bigint | number): IntegerValue => integer('u8', value);
export const u16 = (value: bigint | number): IntegerValue => integer('u16', value);
export const u32 = (value: bigint | number): IntegerValue => integer('u32', value);
export const u64 = (value: bigint | number): IntegerValue => integer('u64', value);
export const i8 = (value: bigint | number): IntegerValue => integer('i8', value);
export const i16 = (value: bigint | number): IntegerValue => integer('i16', value);
export const i32 = (value: bigint | number): IntegerValue => integer('i32', value);
export const i64 = (value: bigint | number): IntegerValue => integer('i64', value);

export function bool(value: boolean): BooleanValue {
  return { kind: 'boolean', type: 'bool', value };
}

/**
 * Create a scalar of the given type from a raw JavaScript value
 */
export function scalar(type: ScalarType, value: bigint | number | boolean): ScalarValue {
  if (!isIntegerType(type)) {
    if (typeof value !== 'boolean') {
      throw new TypeMismatchError(`bool expects true or false, got ${String(value)}`, { value: String(value) });
    }
    return bool(value);
  }
  if (typeof value === 'boolean') {
    throw new TypeMismatchError(`${type} expects an integer, got ${String(value)}`, { type });
  }
  return integer(type, value);
}

/**
 * Create a fixed-length array from raw element values
 *
 * @example
 * ```typescript
 * const a = array('u8', [1, 2, 3, 4]);
 * ```
 */
export function array(elementType: ScalarType, elements: readonly (bigint | number | boolean)[]): ArrayValue {
  return {
    kind: 'array',
    elementType,
    elements: Object.freeze(elements.map((e) => scalar(elementType, e))),
  };
}

// ============================================================================
// Shape Checks
// ============================================================================

function scalarMismatch(value: ScalarValue, expected: ScalarType): string | undefined {
  if (value.type !== expected) {
    return `expected ${expected}, got ${value.type}`;
  }
  if (value.kind === 'boolean') {
    return typeof value.value === 'boolean' ? undefined : 'bool value is not a boolean';
  }
  if (typeof value.value !== 'bigint') {
    return `${expected} value is not a bigint`;
  }
  if (!fitsIn(value.type, value.value)) {
    return `${value.value} is out of range for ${expected}`;
  }
  return undefined;
}

/**
 * Explain why a value does not match a declared type, or undefined when it does
 */
export function describeValueMismatch(value: Value, expected: ValueType): string | undefined {
  if (expected.kind === 'scalar') {
    if (value.kind === 'array') {
      return `expected ${expected.scalar}, got an array of length ${value.elements.length}`;
    }
    return scalarMismatch(value, expected.scalar);
  }

  if (value.kind !== 'array') {
    return `expected ${formatValueType(expected)}, got scalar ${value.type}`;
  }
  if (value.elementType !== expected.scalar) {
    return `expected ${formatValueType(expected)}, got ${value.elementType}[${value.elements.length}]`;
  }
  if (value.elements.length !== expected.length) {
    return `expected ${formatValueType(expected)}, got length ${value.elements.length}`;
  }
  for (let i = 0; i < value.elements.length; i++) {
    const element = value.elements[i];
    if (element === undefined) return `missing element ${i}`;
    const reason = scalarMismatch(element, expected.scalar);
    if (reason !== undefined) return `element ${i}: ${reason}`;
  }
  return undefined;
}

export function isValueOfType(value: Value, expected: ValueType): boolean {
  return describeValueMismatch(value, expected) === undefined;
}

// ============================================================================
// Equality and Formatting
// ============================================================================

export function scalarEquals(a: ScalarValue, b: ScalarValue): boolean {
  return a.type === b.type && a.value === b.value;
}

export function valueEquals(a: Value, b: Value): boolean {
  if (a.kind === 'array' || b.kind === 'array') {
    if (a.kind !== 'array' || b.kind !== 'array') return false;
    if (a.elementType !== b.elementType || a.elements.length !== b.elements.length) return false;
    return a.elements.every((e, i) => {
      const other = b.elements[i];
      return other !== undefined && scalarEquals(e, other);
    });
  }
  return scalarEquals(a, b);
}

function formatScalar(value: ScalarValue): string {
  return value.kind === 'boolean' ? String(value.value) : `${value.value}${value.type}`;
}

/**
 * Human-readable rendering: `255u8`, `-128i8`, `true`, `[11u8, 22u8]`
 */
export function formatValue(value: Value): string {
  if (value.kind === 'array') {
    return `[${value.elements.map(formatScalar).join(', ')}]`;
  }
  return formatScalar(value);
}
