/**
 * Tests for program construction, documents and fingerprints
 */

import { describe, it, expect } from 'vitest';
import { MalformedProgramError, UnsupportedOperationError } from '../api/errors';
import { ProgramBuilder } from '../program/builder';
import {
  loadProgram,
  parseProgramDocument,
  programFingerprint,
  serializeProgram,
} from '../program/document';
import { createProgram } from '../program/program';
import { ref, type ProgramDefinition } from '../program/types';
import { u16, u32, u8 } from '../values/construct';
import { formatValueType } from '../values/types';

function addDefinition(): ProgramDefinition {
  return new ProgramBuilder('add')
    .param('a', 'u8', 'encrypted')
    .param('b', 'u8', 'encrypted')
    .op('add', ['a', 'b'], 'sum')
    .output('out', 'sum', 'u8', 'encrypted')
    .toDefinition();
}

describe('Program Representation', () => {
  describe('Construction', () => {
    it('should infer result types in declaration order', () => {
      const program = new ProgramBuilder('scale')
        .param('ct', 'u8', 'encrypted')
        .param('scale', 'u8', 'plaintext')
        .op('mul_wide', ['ct', 'scale'], 'product', { resultType: 'u16' })
        .op('compare_gt', ['product', u16(100)], 'big')
        .output('out', 'product', 'u16', 'encrypted')
        .build();

      const product = program.typeOf('product');
      const big = program.typeOf('big');
      expect(product && formatValueType(product)).toBe('u16');
      expect(big && formatValueType(big)).toBe('bool');
      expect(program.operations.map((op) => op.position)).toEqual([0, 1]);
    });

    it('should be immutable once built', () => {
      const program = createProgram(addDefinition());
      expect(Object.isFrozen(program.operations)).toBe(true);
      expect(Object.isFrozen(program.operations[0])).toBe(true);
      expect(Object.isFrozen(program.parameters)).toBe(true);
    });

    it('should round-trip through its definition', () => {
      const definition = addDefinition();
      expect(createProgram(definition).toDefinition()).toEqual(definition);
    });
  });

  describe('Malformed programs', () => {
    it('should reject forward references', () => {
      const definition: ProgramDefinition = {
        name: 'forward',
        parameters: [{ name: 'a', type: 'u8', tag: 'encrypted' }],
        operations: [
          { opcode: 'add', operands: [ref('a'), ref('later')], dest: 'first' },
          { opcode: 'add', operands: [ref('a'), ref('a')], dest: 'later' },
        ],
        outputs: [{ name: 'out', source: 'first', type: 'u8', tag: 'encrypted' }],
      };
      expect(() => createProgram(definition)).toThrow(MalformedProgramError);
      expect(() => createProgram(definition)).toThrow('Operation 0 (first) references later before it is declared');
    });

    it('should reject duplicate names', () => {
      const duplicateParam = new ProgramBuilder('dup').param('a', 'u8', 'encrypted').param('a', 'u8', 'plaintext');
      expect(() => duplicateParam.build()).toThrow('Parameter a is declared more than once');

      const duplicateDest = new ProgramBuilder('dup')
        .param('a', 'u8', 'encrypted')
        .op('neg', ['a'], 'a');
      expect(() => duplicateDest.build()).toThrow('Destination a is already declared');
    });

    it('should reject element-wise operands of different lengths', () => {
      const builder = new ProgramBuilder('add_arrays')
        .array('a', 'u8', 4, 'encrypted')
        .array('b', 'u8', 3, 'encrypted')
        .op('array_add', ['a', 'b'], 'sum');
      expect(() => builder.build()).toThrow(MalformedProgramError);
      expect(() => builder.build()).toThrow(
        'array_add -> sum: element-wise operands have different lengths (4 and 3)'
      );
    });

    it('should reject outputs of undeclared results', () => {
      const builder = new ProgramBuilder('missing').param('a', 'u8', 'encrypted').output('out', 'nowhere', 'u8', 'encrypted');
      expect(() => builder.build()).toThrow('Output out references undeclared result nowhere');
    });

    it('should reject outputs whose declared type differs from their source', () => {
      const builder = new ProgramBuilder('narrow')
        .param('a', 'u16', 'encrypted')
        .output('out', 'a', 'u8', 'encrypted');
      expect(() => builder.build()).toThrow('Output out is declared u8 but a is u16');
    });

    it('should reject a constant index out of range', () => {
      const builder = new ProgramBuilder('oob').array('arr', 'u8', 4, 'encrypted').op('index', ['arr', u32(4)], 'x');
      expect(() => builder.build()).toThrow('index -> x: constant index 4 is out of range for length 4');
    });

    it('should reject typed constants outside their width', () => {
      const builder = new ProgramBuilder('overflow')
        .param('a', 'u8', 'encrypted')
        .op('compare_gt', ['a', { kind: 'integer', type: 'u8', value: 300n }], 'gt')
        .output('out', 'gt', 'bool', 'encrypted');
      expect(() => builder.build()).toThrow(MalformedProgramError);
      expect(() => builder.build()).toThrow('Operation 0 (gt) operand 1: invalid constant (300 is out of range for u8)');

      const definition: ProgramDefinition = {
        name: 'negative',
        parameters: [{ name: 'a', type: 'u8', tag: 'encrypted' }],
        operations: [
          { opcode: 'add', operands: [ref('a'), { kind: 'const', value: { kind: 'integer', type: 'u8', value: -1n } }], dest: 'x' },
        ],
        outputs: [{ name: 'out', source: 'x', type: 'u8', tag: 'encrypted' }],
      };
      expect(() => createProgram(definition)).toThrow('Operation 0 (x) operand 1: invalid constant (-1 is out of range for u8)');
    });

    it('should reject the wrong number of operands', () => {
      const builder = new ProgramBuilder('arity').param('a', 'u8', 'encrypted').op('add', ['a'], 'x');
      expect(() => builder.build()).toThrow('add -> x: expected 2 operand(s), got 1');
    });

    it('should require a declared result type for widening', () => {
      const builder = new ProgramBuilder('wide').param('a', 'u8', 'encrypted').op('mul_wide', ['a', 'a'], 'x');
      expect(() => builder.build()).toThrow('mul_wide -> x: result type must be declared');
    });

    it('should reject invalid array lengths', () => {
      const builder = new ProgramBuilder('empty').array('arr', 'u8', 0, 'encrypted');
      expect(() => builder.build()).toThrow('Parameter arr has invalid array length 0');
    });
  });

  describe('Unsupported operations', () => {
    it('should reject mixed operand types at construction', () => {
      const builder = new ProgramBuilder('mixed')
        .param('a', 'u8', 'encrypted')
        .param('b', 'i8', 'encrypted')
        .op('add', ['a', 'b'], 'x');
      expect(() => builder.build()).toThrow(UnsupportedOperationError);
      expect(() => builder.build()).toThrow('add -> x: operands must have identical types, got u8 and i8');
    });

    it('should reject ordering comparisons on bool', () => {
      const builder = new ProgramBuilder('bools')
        .param('a', 'bool', 'encrypted')
        .param('b', 'bool', 'encrypted')
        .op('compare_lt', ['a', 'b'], 'x');
      expect(() => builder.build()).toThrow('compare_lt -> x: ordering comparisons are not defined on bool');
    });

    it('should reject a narrowing accumulator', () => {
      const builder = new ProgramBuilder('sum')
        .array('arr', 'u16', 4, 'encrypted')
        .op('array_sum', ['arr'], 'total', { resultType: 'u8' });
      expect(() => builder.build()).toThrow('array_sum -> total: array_sum accumulator u8 is narrower than u16');
    });
  });

  describe('Program documents', () => {
    const document = {
      name: 'inc',
      parameters: [{ name: 'a', type: 'u16', tag: 'encrypted' }],
      operations: [{ opcode: 'add', operands: ['a', { type: 'u16', value: '1' }], dest: 'next' }],
      outputs: [{ name: 'out', source: 'next', type: 'u16', tag: 'encrypted' }],
    };

    it('should parse references and constants', () => {
      const definition = parseProgramDocument(JSON.stringify(document));
      const operands = definition.operations[0]?.operands;
      expect(operands).toEqual([ref('a'), { kind: 'const', value: u16(1) }]);
    });

    it('should serialize back to the same document', () => {
      const program = loadProgram(JSON.stringify(document));
      expect(JSON.parse(serializeProgram(program))).toEqual(document);
    });

    it('should report schema problems as malformed programs', () => {
      const bad = { ...document, parameters: [{ name: 'a', type: 'u12', tag: 'encrypted' }] };
      expect(() => parseProgramDocument(bad)).toThrow(MalformedProgramError);
      expect(() => parseProgramDocument(bad)).toThrow(
        'Invalid program document: parameters.0.type: expected one of u8, u16, u32, u64, i8, i16, i32, i64, bool'
      );
    });

    it('should report invalid JSON as a malformed program', () => {
      expect(() => parseProgramDocument('{')).toThrow(MalformedProgramError);
    });

    it('should reject constants outside their type', () => {
      const bad = {
        ...document,
        operations: [{ opcode: 'add', operands: ['a', { type: 'u16', value: '70000' }], dest: 'next' }],
      };
      expect(() => parseProgramDocument(bad)).toThrow(
        'operation 0 operand 1: invalid constant (70000 is out of range for u16 (0..65535))'
      );
    });
  });

  describe('Fingerprints', () => {
    it('should ignore the program name', () => {
      const a = addDefinition();
      const b = { ...addDefinition(), name: 'renamed', description: 'same computation' };
      expect(programFingerprint(a)).toBe(programFingerprint(b));
      expect(programFingerprint(a)).toMatch(/^sha256:[0-9a-f]{64}$/);
    });

    it('should tell programs with the same name apart', () => {
      const other = new ProgramBuilder('add')
        .param('a', 'u8', 'encrypted')
        .param('b', 'u8', 'encrypted')
        .op('sub', ['a', 'b'], 'sum')
        .output('out', 'sum', 'u8', 'encrypted')
        .toDefinition();
      expect(programFingerprint(other)).not.toBe(programFingerprint(addDefinition()));
    });

    it('should not depend on how constants were written', () => {
      const withNumber = parseProgramDocument({
        name: 'inc',
        parameters: [{ name: 'a', type: 'u8', tag: 'encrypted' }],
        operations: [{ opcode: 'add', operands: ['a', { type: 'u8', value: 1 }], dest: 'next' }],
        outputs: [{ name: 'out', source: 'next', type: 'u8', tag: 'encrypted' }],
      });
      const withBuilder = new ProgramBuilder('inc')
        .param('a', 'u8', 'encrypted')
        .op('add', ['a', u8(1)], 'next')
        .output('out', 'next', 'u8', 'encrypted')
        .toDefinition();
      expect(programFingerprint(withNumber)).toBe(programFingerprint(withBuilder));
    });
  });
});
