/**
 * @file program/builder.ts
 * @brief Fluent construction API for front ends and tests
 *
 * @example
 * ```typescript
 * const program = new ProgramBuilder('scale_u8')
 *   .param('ct', 'u8', 'encrypted')
 *   .param('scale', 'u8', 'plaintext')
 *   .op('mul_wide', ['ct', 'scale'], 'product', { resultType: 'u16' })
 *   .output('out', 'product', 'u16', 'encrypted')
 *   .build();
 * ```
 */

import type { ScalarType, ScalarValue } from '../values/types';
import { createProgram, type Program } from './program';
import {
  constant,
  ref,
  type Opcode,
  type Operand,
  type OperationDefinition,
  type OutputDefinition,
  type ParameterDefinition,
  type ProgramDefinition,
  type Tag,
} from './types';

/** A parameter/result name, or a constant value */
export type OperandInput = string | ScalarValue | Operand;

export interface OperationOptions {
  resultType?: ScalarType;
  tag?: Tag;
}

function toOperand(input: OperandInput): Operand {
  if (typeof input === 'string') return ref(input);
  if (input.kind === 'ref' || input.kind === 'const') return input;
  return constant(input);
}

export class ProgramBuilder {
  private readonly parameters: ParameterDefinition[] = [];
  private readonly operations: OperationDefinition[] = [];
  private readonly outputs: OutputDefinition[] = [];
  private description: string | undefined;

  constructor(private readonly name: string) {}

  describe(description: string): this {
    this.description = description;
    return this;
  }

  param(name: string, type: ScalarType, tag: Tag): this {
    this.parameters.push({ name, type, tag });
    return this;
  }

  array(name: string, type: ScalarType, length: number, tag: Tag): this {
    this.parameters.push({ name, type, tag, length });
    return this;
  }

  op(opcode: Opcode, operands: readonly OperandInput[], dest: string, options: OperationOptions = {}): this {
    this.operations.push({
      opcode,
      operands: operands.map(toOperand),
      dest,
      ...(options.resultType !== undefined ? { resultType: options.resultType } : {}),
      ...(options.tag !== undefined ? { tag: options.tag } : {}),
    });
    return this;
  }

  output(name: string, source: string, type: ScalarType, tag: Tag, length?: number): this {
    this.outputs.push({ name, source, type, tag, ...(length !== undefined ? { length } : {}) });
    return this;
  }

  toDefinition(): ProgramDefinition {
    return {
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      parameters: [...this.parameters],
      operations: [...this.operations],
      outputs: [...this.outputs],
    };
  }

  build(): Program {
    return createProgram(this.toDefinition());
  }
}
