/**
 * @file values/codec.ts
 * @brief JSON encoding of typed values
 *
 * Integers are written as decimal strings so u64/i64 survive JSON:
 *
 *   { "type": "u8", "value": "255" }
 *   { "type": "bool", "value": true }
 *   { "type": "u8", "length": 4, "values": ["1", "2", "3", "4"] }
 *
 * Decoding also accepts safe-integer numbers for hand-written documents.
 */

import { z } from 'zod';
import { TypeMismatchError } from '../api/errors';
import { array, scalar } from './construct';
import { isScalarType, type ScalarType, type ScalarValue, type Value } from './types';

export const ScalarTypeSchema = z.custom<ScalarType>(
  (value) => typeof value === 'string' && isScalarType(value),
  { message: 'expected one of u8, u16, u32, u64, i8, i16, i32, i64, bool' }
);

const RawScalarSchema = z.union([z.string().regex(/^-?\d+$/, 'expected a decimal integer'), z.number().int(), z.boolean()]);

export const EncodedScalarSchema = z
  .object({
    type: ScalarTypeSchema,
    value: RawScalarSchema,
  })
  .strict();

export const EncodedArraySchema = z
  .object({
    type: ScalarTypeSchema,
    length: z.number().int().positive(),
    values: z.array(RawScalarSchema),
  })
  .strict();

export const EncodedValueSchema = z.union([EncodedArraySchema, EncodedScalarSchema]);

export type RawScalar = z.infer<typeof RawScalarSchema>;
export type EncodedScalar = z.infer<typeof EncodedScalarSchema>;
export type EncodedArray = z.infer<typeof EncodedArraySchema>;
export type EncodedValue = z.infer<typeof EncodedValueSchema>;

function encodeRaw(value: ScalarValue): RawScalar {
  return value.kind === 'boolean' ? value.value : value.value.toString();
}

function decodeRaw(raw: RawScalar): bigint | number | boolean {
  return typeof raw === 'string' ? BigInt(raw) : raw;
}

export function encodeScalar(value: ScalarValue): EncodedScalar {
  return { type: value.type, value: encodeRaw(value) };
}

export function encodeValue(value: Value): EncodedValue {
  if (value.kind === 'array') {
    return {
      type: value.elementType,
      length: value.elements.length,
      values: value.elements.map(encodeRaw),
    };
  }
  return encodeScalar(value);
}

export function decodeScalar(encoded: EncodedScalar): ScalarValue {
  return scalar(encoded.type, decodeRaw(encoded.value));
}

/**
 * Decode a validated encoded value
 *
 * @throws TypeMismatchError when a value does not fit its type or an array's
 *   element count differs from its declared length
 */
export function decodeValue(encoded: EncodedValue): Value {
  if ('values' in encoded) {
    if (encoded.values.length !== encoded.length) {
      throw new TypeMismatchError(
        `array declares length ${encoded.length} but has ${encoded.values.length} values`,
        { type: encoded.type, length: encoded.length }
      );
    }
    return array(encoded.type, encoded.values.map(decodeRaw));
  }
  return decodeScalar(encoded);
}

export function encodeValueMap(values: ReadonlyMap<string, Value>): Record<string, EncodedValue> {
  const out: Record<string, EncodedValue> = {};
  for (const [name, value] of values) {
    out[name] = encodeValue(value);
  }
  return out;
}

export function decodeValueMap(encoded: Readonly<Record<string, EncodedValue>>): Map<string, Value> {
  const out = new Map<string, Value>();
  for (const [name, value] of Object.entries(encoded)) {
    out.set(name, decodeValue(value));
  }
  return out;
}
