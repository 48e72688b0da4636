/**
 * @file program/types.ts
 * @brief Structured program representation: parameters, operations, outputs
 *
 * This is the form a front end produces after parsing an annotated FHE
 * function and unrolling its fixed-trip-count loops. It is a straight-line
 * sequence: each operation may only reference parameters and the results
 * of earlier operations.
 */

import type { ScalarType, ScalarValue } from '../values/types';

// ============================================================================
// Capability Tags
// ============================================================================

/**
 * Encryption capability of a value. Encrypted is sticky: anything computed
 * from an encrypted operand is encrypted.
 */
export type Tag = 'encrypted' | 'plaintext';

export const TAGS: readonly Tag[] = ['encrypted', 'plaintext'];

export function isTag(value: string): value is Tag {
  return value === 'encrypted' || value === 'plaintext';
}

// ============================================================================
// Opcodes
// ============================================================================

export type ComparisonOpcode =
  | 'compare_gt'
  | 'compare_ge'
  | 'compare_lt'
  | 'compare_le'
  | 'compare_eq'
  | 'compare_ne';

export type Opcode =
  | 'add'
  | 'sub'
  | 'mul'
  | 'neg'
  | 'and'
  | 'or'
  | 'xor'
  | 'not'
  | ComparisonOpcode
  | 'mul_wide'
  | 'cast'
  | 'select'
  | 'index'
  | 'array_add'
  | 'array_sub'
  | 'array_mul'
  | 'array_sum'
  | 'array_pack';

export const OPCODES: readonly Opcode[] = [
  'add',
  'sub',
  'mul',
  'neg',
  'and',
  'or',
  'xor',
  'not',
  'compare_gt',
  'compare_ge',
  'compare_lt',
  'compare_le',
  'compare_eq',
  'compare_ne',
  'mul_wide',
  'cast',
  'select',
  'index',
  'array_add',
  'array_sub',
  'array_mul',
  'array_sum',
  'array_pack',
];

export function isOpcode(value: string): value is Opcode {
  return (OPCODES as readonly string[]).includes(value);
}

/** Opcodes whose result type must be declared rather than inferred */
export const DECLARED_RESULT_OPCODES: ReadonlySet<Opcode> = new Set<Opcode>(['mul_wide', 'cast', 'array_sum']);

// ============================================================================
// Definitions
// ============================================================================

export interface ParameterDefinition {
  readonly name: string;
  readonly type: ScalarType;
  readonly tag: Tag;
  /** Present for fixed-length array parameters */
  readonly length?: number;
}

export type Operand =
  | { readonly kind: 'ref'; readonly name: string }
  | { readonly kind: 'const'; readonly value: ScalarValue };

export interface OperationDefinition {
  readonly opcode: Opcode;
  readonly operands: readonly Operand[];
  readonly dest: string;
  /** Required for mul_wide, cast and array_sum; for array results, the element type */
  readonly resultType?: ScalarType;
  /** Declared destination tag; plaintext on an encrypted-derived result is a violation */
  readonly tag?: Tag;
}

export interface OutputDefinition {
  readonly name: string;
  readonly source: string;
  readonly type: ScalarType;
  readonly tag: Tag;
  readonly length?: number;
}

export interface ProgramDefinition {
  /** Not required to be unique; programs are identified by their operations */
  readonly name: string;
  readonly description?: string;
  readonly parameters: readonly ParameterDefinition[];
  readonly operations: readonly OperationDefinition[];
  readonly outputs: readonly OutputDefinition[];
}

export function ref(name: string): Operand {
  return { kind: 'ref', name };
}

export function constant(value: ScalarValue): Operand {
  return { kind: 'const', value };
}
