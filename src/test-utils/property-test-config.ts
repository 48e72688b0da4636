/**
 * Property-based testing configuration and utilities
 *
 * This module provides configuration and arbitraries for property-based
 * testing using fast-check. All property tests should use these
 * configurations to keep run counts consistent across the test suite.
 */

import * as fc from 'fast-check';
import { array, integer } from '../values/construct';
import {
  INTEGER_TYPES,
  maxValue,
  minValue,
  SCALAR_TYPES,
  type ArrayValue,
  type IntegerType,
  type IntegerValue,
  type ScalarType,
} from '../values/types';
import type { Tag } from '../program/types';

export type PropertyTestConfig = Pick<fc.Parameters<unknown>, 'numRuns' | 'verbose' | 'seed' | 'endOnFailure'>;

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property test
 * - Seed logging for reproducibility
 * - Shrinking enabled for minimal failing examples
 */
export const PROPERTY_TEST_CONFIG: PropertyTestConfig = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for fast property tests (used during development)
 */
export const FAST_PROPERTY_TEST_CONFIG: PropertyTestConfig = {
  numRuns: 10,
  verbose: false,
  seed: Date.now(),
};

/**
 * Configuration for exhaustive property tests (used for critical properties)
 */
export const EXHAUSTIVE_PROPERTY_TEST_CONFIG: PropertyTestConfig = {
  numRuns: 1000,
  verbose: true,
  seed: Date.now(),
  endOnFailure: false,
};

/**
 * Arbitrary generator for fixed-width integer types
 */
export function arbitraryIntegerType(): fc.Arbitrary<IntegerType> {
  return fc.constantFrom(...INTEGER_TYPES);
}

export function arbitraryScalarType(): fc.Arbitrary<ScalarType> {
  return fc.constantFrom(...SCALAR_TYPES);
}

export function arbitraryTag(): fc.Arbitrary<Tag> {
  return fc.constantFrom<Tag>('encrypted', 'plaintext');
}

/**
 * Any bigint in the type's range, edges included
 */
export function arbitraryRawInteger(type: IntegerType): fc.Arbitrary<bigint> {
  return fc.oneof(
    fc.constantFrom(minValue(type), maxValue(type), 0n),
    fc.bigInt({ min: minValue(type), max: maxValue(type) })
  );
}

export function arbitraryIntegerValue(type: IntegerType): fc.Arbitrary<IntegerValue> {
  return arbitraryRawInteger(type).map((v) => integer(type, v));
}

/**
 * Two values of the same randomly chosen integer type
 */
export function arbitraryIntegerPair(): fc.Arbitrary<[IntegerValue, IntegerValue]> {
  return arbitraryIntegerType().chain((type) =>
    fc.tuple(arbitraryIntegerValue(type), arbitraryIntegerValue(type))
  );
}

/**
 * A fixed-length array of the given element type
 */
export function arbitraryIntegerArray(type: IntegerType, length: number): fc.Arbitrary<ArrayValue> {
  return fc
    .array(arbitraryRawInteger(type), { minLength: length, maxLength: length })
    .map((raw) => array(type, raw));
}
