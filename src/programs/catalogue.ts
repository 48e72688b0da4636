/**
 * @file programs/catalogue.ts
 * @brief Example FHE programs in structured form
 *
 * These are the annotated example functions (add, greater_than, inc, the
 * add_<type> family, sum_array_u8, add_arrays_u8, scale_u8) as a front end
 * would hand them over: parameters tagged, loops unrolled, every result
 * typed. Each comes with a sample input set used by the CLI and the tests.
 */

import { ProgramBuilder } from '../program/builder';
import { createProgram, type Program } from '../program/program';
import type { ProgramDefinition } from '../program/types';
import { array, bool, scalar, u16, u32, u8 } from '../values/construct';
import { bitWidthOf, INTEGER_TYPES, isSigned, type IntegerType, type Value } from '../values/types';

export interface ExampleProgram {
  definition: ProgramDefinition;
  sampleInputs: Readonly<Record<string, Value>>;
}

// ============================================================================
// Scalar Examples
// ============================================================================

function addOf(type: IntegerType, name = `add_${type}`): ExampleProgram {
  const definition = new ProgramBuilder(name)
    .describe(`Add two encrypted ${type} values, wrapping on overflow`)
    .param('a', type, 'encrypted')
    .param('b', type, 'encrypted')
    .op('add', ['a', 'b'], 'sum')
    .output('out', 'sum', type, 'encrypted')
    .toDefinition();

  // a sample that exercises wraparound: max + 1 for unsigned, -1 + 1 for signed
  const a = isSigned(type) ? -1n : (1n << BigInt(bitWidthOf(type))) - 1n;
  return { definition, sampleInputs: { a: scalar(type, a), b: scalar(type, 1n) } };
}

function greaterThanOf(type: IntegerType, name = `greater_than_${type}`): ExampleProgram {
  const definition = new ProgramBuilder(name)
    .describe(`Compare two encrypted ${type} values`)
    .param('a', type, 'encrypted')
    .param('b', type, 'encrypted')
    .op('compare_gt', ['a', 'b'], 'gt')
    .output('out', 'gt', 'bool', 'encrypted')
    .toDefinition();

  return { definition, sampleInputs: { a: scalar(type, 200n), b: scalar(type, 100n) } };
}

const inc: ExampleProgram = {
  definition: new ProgramBuilder('inc')
    .describe('Increment an encrypted u16')
    .param('a', 'u16', 'encrypted')
    .op('add', ['a', u16(1)], 'next')
    .output('out', 'next', 'u16', 'encrypted')
    .toDefinition(),
  sampleInputs: { a: u16(41) },
};

const scaleU8: ExampleProgram = {
  definition: new ProgramBuilder('scale_u8')
    .describe('Scale an encrypted u8 by a plaintext u8 into a u16')
    .param('ct', 'u8', 'encrypted')
    .param('scale', 'u8', 'plaintext')
    .op('mul_wide', ['ct', 'scale'], 'product', { resultType: 'u16' })
    .output('out', 'product', 'u16', 'encrypted')
    .toDefinition(),
  sampleInputs: { ct: u8(3), scale: u8(4) },
};

// ============================================================================
// Array Examples (loops unrolled)
// ============================================================================

const ARRAY_LENGTH = 4;

/**
 * sum += arr[i] into a u16 accumulator, four times
 */
function sumArrayU8(): ExampleProgram {
  const builder = new ProgramBuilder('sum_array_u8')
    .describe('Sum four encrypted u8 values into a u16')
    .array('arr', 'u8', ARRAY_LENGTH, 'encrypted');

  let acc = '';
  for (let i = 0; i < ARRAY_LENGTH; i++) {
    builder
      .op('index', ['arr', u32(i)], `e${i}`)
      .op('cast', [`e${i}`], `w${i}`, { resultType: 'u16' });
    if (i === 0) {
      builder.op('add', [u16(0), 'w0'], 'acc0');
    } else {
      builder.op('add', [acc, `w${i}`], `acc${i}`);
    }
    acc = `acc${i}`;
  }

  return {
    definition: builder.output('out', acc, 'u16', 'encrypted').toDefinition(),
    sampleInputs: { arr: array('u8', [1, 2, 3, 4]) },
  };
}

/**
 * out[i] = a[i] + b[i], four times, then the writes packed into out
 */
function addArraysU8(): ExampleProgram {
  const builder = new ProgramBuilder('add_arrays_u8')
    .describe('Element-wise add of two encrypted four-element u8 arrays')
    .array('a', 'u8', ARRAY_LENGTH, 'encrypted')
    .array('b', 'u8', ARRAY_LENGTH, 'encrypted');

  const lanes: string[] = [];
  for (let i = 0; i < ARRAY_LENGTH; i++) {
    builder
      .op('index', ['a', u32(i)], `a${i}`)
      .op('index', ['b', u32(i)], `b${i}`)
      .op('add', [`a${i}`, `b${i}`], `s${i}`);
    lanes.push(`s${i}`);
  }

  return {
    definition: builder
      .op('array_pack', lanes, 'packed')
      .output('out', 'packed', 'u8', 'encrypted', ARRAY_LENGTH)
      .toDefinition(),
    sampleInputs: { a: array('u8', [1, 2, 3, 4]), b: array('u8', [10, 20, 30, 40]) },
  };
}

const isPositive: ExampleProgram = {
  definition: new ProgramBuilder('is_positive_i8')
    .describe('Select 1 for a positive encrypted i8, else 0')
    .param('x', 'i8', 'encrypted')
    .op('compare_gt', ['x', scalar('i8', 0)], 'positive')
    .op('select', ['positive', u8(1), u8(0)], 'flag')
    .output('out', 'flag', 'u8', 'encrypted')
    .toDefinition(),
  sampleInputs: { x: scalar('i8', -5) },
};

const xorFlags: ExampleProgram = {
  definition: new ProgramBuilder('xor_flags')
    .describe('Exclusive or of an encrypted and a plaintext flag')
    .param('a', 'bool', 'encrypted')
    .param('b', 'bool', 'plaintext')
    .op('xor', ['a', 'b'], 'x')
    .output('out', 'x', 'bool', 'encrypted')
    .toDefinition(),
  sampleInputs: { a: bool(true), b: bool(false) },
};

// ============================================================================
// Catalogue
// ============================================================================

export const EXAMPLE_PROGRAMS: readonly ExampleProgram[] = [
  addOf('u8', 'add'),
  greaterThanOf('u8', 'greater_than'),
  ...(['u8', 'u16', 'u32', 'u64'] as const).map((type) => greaterThanOf(type)),
  inc,
  ...INTEGER_TYPES.map((type) => addOf(type)),
  sumArrayU8(),
  addArraysU8(),
  scaleU8,
  isPositive,
  xorFlags,
];

/**
 * Every example with the given name. Names are not unique identifiers, so
 * this may return more than one.
 */
export function findExamples(name: string): ExampleProgram[] {
  return EXAMPLE_PROGRAMS.filter((example) => example.definition.name === name);
}

export function exampleNames(): string[] {
  return EXAMPLE_PROGRAMS.map((example) => example.definition.name);
}

/**
 * Construct every example program
 */
export function buildExamples(): Program[] {
  return EXAMPLE_PROGRAMS.map((example) => createProgram(example.definition));
}
