/**
 * @file program/document.ts
 * @brief JSON documents for the structured program representation
 *
 * This is not the annotation syntax of the source language; it is the
 * already-parsed form a front end hands over, written as JSON:
 *
 * ```json
 * {
 *   "name": "inc",
 *   "parameters": [{ "name": "a", "type": "u16", "tag": "encrypted" }],
 *   "operations": [
 *     { "opcode": "add", "operands": ["a", { "type": "u16", "value": "1" }], "dest": "sum" }
 *   ],
 *   "outputs": [{ "name": "out", "source": "sum", "type": "u16", "tag": "encrypted" }]
 * }
 * ```
 *
 * String operands are references; objects are constants.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { MalformedProgramError, TypeMismatchError } from '../api/errors';
import { decodeScalar, encodeScalar, EncodedScalarSchema, ScalarTypeSchema } from '../values/codec';
import { createProgram, Program } from './program';
import {
  constant,
  isOpcode,
  isTag,
  ref,
  type Opcode,
  type Operand,
  type OperationDefinition,
  type OutputDefinition,
  type ParameterDefinition,
  type ProgramDefinition,
  type Tag,
} from './types';

// ============================================================================
// Schemas
// ============================================================================

const TagSchema = z.custom<Tag>((value) => typeof value === 'string' && isTag(value), {
  message: 'expected encrypted or plaintext',
});

const OpcodeSchema = z.custom<Opcode>((value) => typeof value === 'string' && isOpcode(value), {
  message: 'unknown opcode',
});

const NameSchema = z.string().min(1);

const ParameterSchema = z
  .object({
    name: NameSchema,
    type: ScalarTypeSchema,
    tag: TagSchema,
    length: z.number().int().positive().optional(),
  })
  .strict();

const OperandSchema = z.union([NameSchema, EncodedScalarSchema]);

const OperationSchema = z
  .object({
    opcode: OpcodeSchema,
    operands: z.array(OperandSchema),
    dest: NameSchema,
    resultType: ScalarTypeSchema.optional(),
    tag: TagSchema.optional(),
  })
  .strict();

const OutputSchema = z
  .object({
    name: NameSchema,
    source: NameSchema,
    type: ScalarTypeSchema,
    tag: TagSchema,
    length: z.number().int().positive().optional(),
  })
  .strict();

export const ProgramDocumentSchema = z
  .object({
    name: NameSchema,
    description: z.string().optional(),
    parameters: z.array(ParameterSchema),
    operations: z.array(OperationSchema),
    outputs: z.array(OutputSchema),
  })
  .strict();

export type ProgramDocument = z.infer<typeof ProgramDocumentSchema>;
type DocumentOperand = z.infer<typeof OperandSchema>;

// ============================================================================
// Conversion
// ============================================================================

function toOperand(operand: DocumentOperand, where: string): Operand {
  if (typeof operand === 'string') return ref(operand);
  try {
    return constant(decodeScalar(operand));
  } catch (error) {
    if (error instanceof TypeMismatchError) {
      throw new MalformedProgramError(`${where}: invalid constant (${error.message})`, error.details);
    }
    throw error;
  }
}

function fromOperand(operand: Operand): DocumentOperand {
  return operand.kind === 'ref' ? operand.name : encodeScalar(operand.value);
}

/**
 * Convert a validated document into a program definition
 */
export function documentToDefinition(doc: ProgramDocument): ProgramDefinition {
  const parameters = doc.parameters.map(
    (p): ParameterDefinition => ({
      name: p.name,
      type: p.type,
      tag: p.tag,
      ...(p.length !== undefined ? { length: p.length } : {}),
    })
  );

  const operations = doc.operations.map(
    (op, i): OperationDefinition => ({
      opcode: op.opcode,
      operands: op.operands.map((operand, j) => toOperand(operand, `operation ${i} operand ${j}`)),
      dest: op.dest,
      ...(op.resultType !== undefined ? { resultType: op.resultType } : {}),
      ...(op.tag !== undefined ? { tag: op.tag } : {}),
    })
  );

  const outputs = doc.outputs.map(
    (o): OutputDefinition => ({
      name: o.name,
      source: o.source,
      type: o.type,
      tag: o.tag,
      ...(o.length !== undefined ? { length: o.length } : {}),
    })
  );

  return {
    name: doc.name,
    ...(doc.description !== undefined ? { description: doc.description } : {}),
    parameters,
    operations,
    outputs,
  };
}

export function definitionToDocument(definition: ProgramDefinition): ProgramDocument {
  return {
    name: definition.name,
    ...(definition.description !== undefined ? { description: definition.description } : {}),
    parameters: definition.parameters.map((p) => ({
      name: p.name,
      type: p.type,
      tag: p.tag,
      ...(p.length !== undefined ? { length: p.length } : {}),
    })),
    operations: definition.operations.map((op) => ({
      opcode: op.opcode,
      operands: op.operands.map(fromOperand),
      dest: op.dest,
      ...(op.resultType !== undefined ? { resultType: op.resultType } : {}),
      ...(op.tag !== undefined ? { tag: op.tag } : {}),
    })),
    outputs: definition.outputs.map((o) => ({
      name: o.name,
      source: o.source,
      type: o.type,
      tag: o.tag,
      ...(o.length !== undefined ? { length: o.length } : {}),
    })),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate a program document
 *
 * @throws MalformedProgramError for invalid JSON or a document that does not
 *   match the schema
 */
export function parseProgramDocument(input: unknown): ProgramDefinition {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedProgramError(`Program document is not valid JSON: ${reason}`);
    }
  }

  const parsed = ProgramDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedProgramError(`Invalid program document: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return documentToDefinition(parsed.data);
}

/**
 * Parse a document and construct its program
 */
export function loadProgram(input: unknown): Program {
  return createProgram(parseProgramDocument(input));
}

export function serializeProgram(program: Program | ProgramDefinition): string {
  const definition = program instanceof Program ? program.toDefinition() : program;
  return JSON.stringify(definitionToDocument(definition), null, 2);
}

/**
 * Hash of a program's parameters, operations and outputs. Names and
 * descriptions are left out: two programs with the same name may differ,
 * and two with different names may be the same computation.
 */
export function programFingerprint(program: Program | ProgramDefinition): string {
  const definition = program instanceof Program ? program.toDefinition() : program;
  const { parameters, operations, outputs } = definitionToDocument(definition);
  const canonical = JSON.stringify({ parameters, operations, outputs });
  return `sha256:${createHash('sha256').update(canonical).digest('hex')}`;
}
