/**
 * @file program/program.ts
 * @brief Immutable, validated program representation
 *
 * createProgram validates a ProgramDefinition once and produces a Program
 * whose parameters, operations and outputs are frozen. Declaration order is
 * the only valid evaluation order: a reference to a name that has not been
 * declared yet is rejected, so the operation list is always a topological
 * order of its own data flow.
 */

import { MalformedProgramError, UnsupportedOperationError } from '../api/errors';
import type { CheckResult } from '../checker/capability-checker';
import {
  arrayType,
  formatValueType,
  isScalarType,
  scalarType,
  valueTypeEquals,
  type ValueType,
} from '../values/types';
import { describeValueMismatch } from '../values/construct';
import { inferResultType } from './infer';
import {
  isOpcode,
  isTag,
  type Operand,
  type OperationDefinition,
  type OutputDefinition,
  type ParameterDefinition,
  type ProgramDefinition,
} from './types';

/**
 * An operation after validation, with its position and inferred result type
 */
export interface ResolvedOperation extends OperationDefinition {
  readonly position: number;
  readonly type: ValueType;
}

export class Program {
  readonly name: string;
  readonly description: string | undefined;
  readonly parameters: readonly ParameterDefinition[];
  readonly operations: readonly ResolvedOperation[];
  readonly outputs: readonly OutputDefinition[];

  private readonly types: ReadonlyMap<string, ValueType>;
  private readonly parameterIndex: ReadonlyMap<string, ParameterDefinition>;
  private capabilityCheck: CheckResult | undefined;

  /** Use createProgram */
  constructor(
    name: string,
    description: string | undefined,
    parameters: readonly ParameterDefinition[],
    operations: readonly ResolvedOperation[],
    outputs: readonly OutputDefinition[],
    types: ReadonlyMap<string, ValueType>
  ) {
    this.name = name;
    this.description = description;
    this.parameters = parameters;
    this.operations = operations;
    this.outputs = outputs;
    this.types = types;
    this.parameterIndex = new Map(parameters.map((p) => [p.name, p]));
  }

  /** Type of a parameter or operation result */
  typeOf(name: string): ValueType | undefined {
    return this.types.get(name);
  }

  parameter(name: string): ParameterDefinition | undefined {
    return this.parameterIndex.get(name);
  }

  isParameter(name: string): boolean {
    return this.parameterIndex.has(name);
  }

  /**
   * Run the capability check at most once for this program.
   * The checker module owns the rules; the program only keeps the outcome.
   */
  memoizeCheck(run: (program: Program) => CheckResult): CheckResult {
    if (this.capabilityCheck === undefined) {
      this.capabilityCheck = run(this);
    }
    return this.capabilityCheck;
  }

  /** Whether the capability check has already run */
  get isChecked(): boolean {
    return this.capabilityCheck !== undefined;
  }

  toDefinition(): ProgramDefinition {
    return {
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      parameters: this.parameters,
      operations: this.operations.map(stripResolution),
      outputs: this.outputs,
    };
  }
}

function stripResolution(op: ResolvedOperation): OperationDefinition {
  return {
    opcode: op.opcode,
    operands: op.operands,
    dest: op.dest,
    ...(op.resultType !== undefined ? { resultType: op.resultType } : {}),
    ...(op.tag !== undefined ? { tag: op.tag } : {}),
  };
}

// ============================================================================
// Construction
// ============================================================================

function declaredType(
  what: string,
  name: string,
  type: string,
  length: number | undefined
): ValueType {
  if (!isScalarType(type)) {
    throw new MalformedProgramError(`${what} ${name} has unknown type ${type}`, { name, type });
  }
  if (length === undefined) return scalarType(type);
  if (!Number.isSafeInteger(length) || length < 1) {
    throw new MalformedProgramError(`${what} ${name} has invalid array length ${length}`, { name, length });
  }
  return arrayType(type, length);
}

function requireName(what: string, name: string): void {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new MalformedProgramError(`${what} name must be a non-empty string`);
  }
}

function freezeOperand(operand: Operand): Operand {
  const copy: Operand =
    operand.kind === 'ref'
      ? { kind: 'ref', name: operand.name }
      : { kind: 'const', value: Object.freeze({ ...operand.value }) };
  return Object.freeze(copy);
}

/**
 * Validate a program definition and build its immutable representation
 *
 * @throws MalformedProgramError for structural problems
 * @throws UnsupportedOperationError for unknown opcodes or undefined operand types
 *
 * @example
 * ```typescript
 * const program = createProgram({
 *   name: 'add',
 *   parameters: [
 *     { name: 'a', type: 'u8', tag: 'encrypted' },
 *     { name: 'b', type: 'u8', tag: 'encrypted' },
 *   ],
 *   operations: [{ opcode: 'add', operands: [ref('a'), ref('b')], dest: 'sum' }],
 *   outputs: [{ name: 'out', source: 'sum', type: 'u8', tag: 'encrypted' }],
 * });
 * ```
 */
export function createProgram(definition: ProgramDefinition): Program {
  requireName('Program', definition.name);

  const types = new Map<string, ValueType>();

  const parameters = definition.parameters.map((p) => {
    requireName('Parameter', p.name);
    if (types.has(p.name)) {
      throw new MalformedProgramError(`Parameter ${p.name} is declared more than once`, { name: p.name });
    }
    if (!isTag(p.tag)) {
      throw new MalformedProgramError(`Parameter ${p.name} has unknown tag ${String(p.tag)}`, { name: p.name });
    }
    types.set(p.name, declaredType('Parameter', p.name, p.type, p.length));
    return Object.freeze({ ...p });
  });

  const operations = definition.operations.map((op, position): ResolvedOperation => {
    requireName('Operation destination', op.dest);
    if (!isOpcode(op.opcode)) {
      throw new UnsupportedOperationError(`Unknown opcode ${String(op.opcode)} at operation ${position}`, {
        operation: position,
        opcode: op.opcode,
      });
    }
    if (op.tag !== undefined && !isTag(op.tag)) {
      throw new MalformedProgramError(`Operation ${op.dest} has unknown tag ${String(op.tag)}`, {
        operation: position,
      });
    }
    if (op.resultType !== undefined && !isScalarType(op.resultType)) {
      throw new MalformedProgramError(`Operation ${op.dest} has unknown result type ${String(op.resultType)}`, {
        operation: position,
      });
    }

    const operandTypes = op.operands.map((operand, i) => {
      if (operand.kind === 'const') {
        const expected = scalarType(operand.value.type);
        const mismatch = describeValueMismatch(operand.value, expected);
        if (mismatch !== undefined) {
          throw new MalformedProgramError(
            `Operation ${position} (${op.dest}) operand ${i}: invalid constant (${mismatch})`,
            { operation: position, operand: i }
          );
        }
        return expected;
      }
      const t = types.get(operand.name);
      if (t === undefined) {
        throw new MalformedProgramError(
          `Operation ${position} (${op.dest}) references ${operand.name} before it is declared`,
          { operation: position, operand: i, name: operand.name }
        );
      }
      return t;
    });

    if (types.has(op.dest)) {
      throw new MalformedProgramError(`Destination ${op.dest} is already declared`, {
        operation: position,
        name: op.dest,
      });
    }

    const type = inferResultType({ operation: op, position, operandTypes });
    types.set(op.dest, type);

    return Object.freeze({
      ...op,
      operands: Object.freeze(op.operands.map(freezeOperand)),
      position,
      type,
    });
  });

  const outputNames = new Set<string>();
  const outputs = definition.outputs.map((out) => {
    requireName('Output', out.name);
    if (outputNames.has(out.name)) {
      throw new MalformedProgramError(`Output ${out.name} is declared more than once`, { name: out.name });
    }
    outputNames.add(out.name);
    if (!isTag(out.tag)) {
      throw new MalformedProgramError(`Output ${out.name} has unknown tag ${String(out.tag)}`, { name: out.name });
    }

    const sourceType = types.get(out.source);
    if (sourceType === undefined) {
      throw new MalformedProgramError(`Output ${out.name} references undeclared result ${out.source}`, {
        name: out.name,
        source: out.source,
      });
    }
    const expected = declaredType('Output', out.name, out.type, out.length);
    if (!valueTypeEquals(expected, sourceType)) {
      throw new MalformedProgramError(
        `Output ${out.name} is declared ${formatValueType(expected)} but ${out.source} is ${formatValueType(sourceType)}`,
        { name: out.name, source: out.source }
      );
    }
    return Object.freeze({ ...out });
  });

  return new Program(
    definition.name,
    definition.description,
    Object.freeze(parameters),
    Object.freeze(operations),
    Object.freeze(outputs),
    types
  );
}
