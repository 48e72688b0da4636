/**
 * @file values/types.ts
 * @brief Scalar types, bit widths and typed values
 *
 * Integers are carried as bigint so that u64/i64 stay exact. Signed values
 * hold their two's-complement numeric value (an i8 of 0xff is -1n), which
 * lets comparisons work on the numbers directly.
 */

import { TypeMismatchError } from '../api/errors';

// ============================================================================
// Scalar Types
// ============================================================================

export type UnsignedType = 'u8' | 'u16' | 'u32' | 'u64';
export type SignedType = 'i8' | 'i16' | 'i32' | 'i64';
export type IntegerType = UnsignedType | SignedType;
export type ScalarType = IntegerType | 'bool';

/**
 * Valid integer bit widths
 */
export type BitWidth = 8 | 16 | 32 | 64;

export interface IntegerTypeInfo {
  readonly bits: BitWidth;
  readonly signed: boolean;
}

const INTEGER_TYPE_INFO: Record<IntegerType, IntegerTypeInfo> = {
  u8: { bits: 8, signed: false },
  u16: { bits: 16, signed: false },
  u32: { bits: 32, signed: false },
  u64: { bits: 64, signed: false },
  i8: { bits: 8, signed: true },
  i16: { bits: 16, signed: true },
  i32: { bits: 32, signed: true },
  i64: { bits: 64, signed: true },
};

export const INTEGER_TYPES: readonly IntegerType[] = ['u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64'];

export const SCALAR_TYPES: readonly ScalarType[] = [...INTEGER_TYPES, 'bool'];

export function isScalarType(value: string): value is ScalarType {
  return (SCALAR_TYPES as readonly string[]).includes(value);
}

export function isIntegerType(type: ScalarType): type is IntegerType {
  return type !== 'bool';
}

export function integerTypeInfo(type: IntegerType): IntegerTypeInfo {
  return INTEGER_TYPE_INFO[type];
}

export function bitWidthOf(type: IntegerType): BitWidth {
  return INTEGER_TYPE_INFO[type].bits;
}

export function isSigned(type: IntegerType): boolean {
  return INTEGER_TYPE_INFO[type].signed;
}

/**
 * Look up the integer type with the given width and signedness
 */
export function integerType(bits: BitWidth, signed: boolean): IntegerType {
  const found = INTEGER_TYPES.find((t) => {
    const info = INTEGER_TYPE_INFO[t];
    return info.bits === bits && info.signed === signed;
  });
  if (found === undefined) {
    throw new TypeMismatchError(`No integer type with ${bits} bits`);
  }
  return found;
}

// ============================================================================
// Bit Width Helpers
// ============================================================================

export function parseBitWidth(bits: number): BitWidth {
  switch (bits) {
    case 8:
    case 16:
    case 32:
    case 64:
      return bits;
    default:
      throw new TypeMismatchError(`bit width must be 8, 16, 32, or 64, got ${bits}`, { bits });
  }
}

export function byteWidth(bits: BitWidth): number {
  return bits / 8;
}

export function maxUnsigned(bits: BitWidth): bigint {
  return (1n << BigInt(bits)) - 1n;
}

export function minSigned(bits: BitWidth): bigint {
  return -(1n << BigInt(bits - 1));
}

export function maxSigned(bits: BitWidth): bigint {
  return (1n << BigInt(bits - 1)) - 1n;
}

/**
 * Reinterpret a signed value as its unsigned two's-complement bit pattern
 */
export function signedToUnsigned(bits: BitWidth, value: bigint): bigint {
  return BigInt.asUintN(bits, value);
}

/**
 * Reinterpret an unsigned bit pattern as a two's-complement signed value
 */
export function unsignedToSigned(bits: BitWidth, value: bigint): bigint {
  return BigInt.asIntN(bits, value);
}

export function minValue(type: IntegerType): bigint {
  const { bits, signed } = INTEGER_TYPE_INFO[type];
  return signed ? minSigned(bits) : 0n;
}

export function maxValue(type: IntegerType): bigint {
  const { bits, signed } = INTEGER_TYPE_INFO[type];
  return signed ? maxSigned(bits) : maxUnsigned(bits);
}

export function fitsIn(type: IntegerType, value: bigint): boolean {
  return value >= minValue(type) && value <= maxValue(type);
}

// ============================================================================
// Values
// ============================================================================

export interface IntegerValue {
  readonly kind: 'integer';
  readonly type: IntegerType;
  readonly value: bigint;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly type: 'bool';
  readonly value: boolean;
}

export type ScalarValue = IntegerValue | BooleanValue;

/**
 * Fixed-length array; the length is part of its type
 */
export interface ArrayValue {
  readonly kind: 'array';
  readonly elementType: ScalarType;
  readonly elements: readonly ScalarValue[];
}

export type Value = ScalarValue | ArrayValue;

// ============================================================================
// Value Types (shape of a value)
// ============================================================================

export type ValueType =
  | { readonly kind: 'scalar'; readonly scalar: ScalarType }
  | { readonly kind: 'array'; readonly scalar: ScalarType; readonly length: number };

export function scalarType(scalar: ScalarType): ValueType {
  return { kind: 'scalar', scalar };
}

export function arrayType(scalar: ScalarType, length: number): ValueType {
  return { kind: 'array', scalar, length };
}

export function valueTypeEquals(a: ValueType, b: ValueType): boolean {
  if (a.kind === 'scalar' && b.kind === 'scalar') return a.scalar === b.scalar;
  if (a.kind === 'array' && b.kind === 'array') return a.scalar === b.scalar && a.length === b.length;
  return false;
}

export function formatValueType(type: ValueType): string {
  return type.kind === 'scalar' ? type.scalar : `${type.scalar}[${type.length}]`;
}

export function valueTypeOf(value: Value): ValueType {
  if (value.kind === 'array') {
    return arrayType(value.elementType, value.elements.length);
  }
  return scalarType(value.type);
}
