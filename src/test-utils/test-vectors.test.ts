/**
 * Tests for test-vector generation, envelope checks and equivalence checking
 */

import { describe, it, expect } from 'vitest';
import { FHEProgramError, FHEProgramErrorCode } from '../api/errors';
import { assertChecked } from '../checker/capability-checker';
import { ProgramBuilder } from '../program/builder';
import {
  caseInputs,
  compareOutputs,
  generateTestVectors,
  parseTestVectors,
  peekTestVectorVersion,
  serializeTestVectors,
  TEST_VECTOR_MAGIC,
  TEST_VECTOR_VERSION,
  verifyAgainstVectors,
  verifyTestVectors,
} from '../test-vectors/test-vectors';
import { add } from '../values/arithmetic';
import { u8 } from '../values/construct';
import type { Value } from '../values/types';

function addProgram(name = 'add') {
  return new ProgramBuilder(name)
    .param('a', 'u8', 'encrypted')
    .param('b', 'u8', 'encrypted')
    .op('add', ['a', 'b'], 'sum')
    .output('out', 'sum', 'u8', 'encrypted')
    .build();
}

const checked = assertChecked(addProgram());
const doc = generateTestVectors(checked, [
  { a: u8(1), b: u8(2) },
  { a: u8(255), b: u8(1) },
]);

function expectSerializationError(run: () => unknown, message: string): void {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(FHEProgramError);
    if (error instanceof FHEProgramError) {
      expect(error.code).toBe(FHEProgramErrorCode.SERIALIZATION_ERROR);
      expect(error.message).toBe(message);
    }
    return;
  }
  throw new Error('expected a serialization error');
}

describe('Test Vectors', () => {
  describe('Generation', () => {
    it('should record inputs and reference outputs per case', () => {
      expect(doc.magic).toBe(TEST_VECTOR_MAGIC);
      expect(doc.version).toBe(TEST_VECTOR_VERSION);
      expect(doc.program).toBe('add');
      expect(doc.cases).toEqual([
        {
          inputs: { a: { type: 'u8', value: '1' }, b: { type: 'u8', value: '2' } },
          outputs: { out: { type: 'u8', value: '3' } },
        },
        {
          inputs: { a: { type: 'u8', value: '255' }, b: { type: 'u8', value: '1' } },
          outputs: { out: { type: 'u8', value: '0' } },
        },
      ]);
    });

    it('should abort on the first failing input set', () => {
      expect(() => generateTestVectors(checked, [{ a: u8(1), b: u8(2) }, { a: u8(1) }])).toThrow(
        'Missing input for parameter b'
      );
    });
  });

  describe('Envelope', () => {
    it('should round-trip through JSON', () => {
      expect(parseTestVectors(serializeTestVectors(doc))).toEqual(doc);
      expect(peekTestVectorVersion(serializeTestVectors(doc))).toBe(1);
    });

    it('should reject an unsupported version', () => {
      const text = JSON.stringify({ ...doc, version: 2 });
      expectSerializationError(() => parseTestVectors(text), 'Unsupported test vector version 2, expected 1');
      expect(peekTestVectorVersion(text)).toBe(2);
    });

    it('should reject the wrong magic', () => {
      const text = JSON.stringify({ ...doc, magic: 'NOPE' });
      expectSerializationError(() => parseTestVectors(text), 'Invalid magic "NOPE", expected FHTV');
    });

    it('should reject a corrupt version field', () => {
      const text = JSON.stringify({ ...doc, version: 'one' });
      expectSerializationError(() => peekTestVectorVersion(text), 'Test vector version field is corrupt or unreadable');
    });

    it('should reject a missing header', () => {
      expectSerializationError(() => parseTestVectors('[]'), 'Test vectors are missing their header');
    });

    it('should reject a bad payload after a good header', () => {
      const text = JSON.stringify({ ...doc, cases: [{ inputs: {} }] });
      expectSerializationError(() => parseTestVectors(text), 'Test vector payload is invalid: cases.0.outputs: Required');
    });
  });

  describe('Equivalence checking', () => {
    it('should pass the reference evaluator against its own vectors', () => {
      const report = verifyTestVectors(checked, doc);
      expect(report).toEqual({
        valid: true,
        fingerprintMatches: true,
        casesChecked: 2,
        mismatches: [],
        errors: [],
      });
    });

    it('should accept vectors under another name for the same computation', () => {
      const renamed = assertChecked(addProgram('add_u8'));
      expect(verifyTestVectors(renamed, doc).valid).toBe(true);
    });

    it('should flag vectors generated for a different program', () => {
      const sub = assertChecked(
        new ProgramBuilder('add')
          .param('a', 'u8', 'encrypted')
          .param('b', 'u8', 'encrypted')
          .op('sub', ['a', 'b'], 'sum')
          .output('out', 'sum', 'u8', 'encrypted')
          .build()
      );
      const report = verifyTestVectors(sub, doc);
      expect(report.valid).toBe(false);
      expect(report.fingerprintMatches).toBe(false);
      expect(report.mismatches).toEqual([
        { caseIndex: 0, output: 'out', kind: 'different', expected: '3u8', actual: '255u8' },
        { caseIndex: 1, output: 'out', kind: 'different', expected: '0u8', actual: '254u8' },
      ]);
    });

    it('should report a candidate that gets one case wrong', () => {
      const candidate = (inputs: ReadonlyMap<string, Value>): ReadonlyMap<string, Value> => {
        const a = inputs.get('a');
        const b = inputs.get('b');
        if (a === undefined || b === undefined) throw new Error('missing inputs');
        const sum = add(a, b);
        // saturating instead of wrapping
        return new Map([['out', sum.value < (a.kind === 'integer' ? a.value : 0n) ? u8(255) : sum]]);
      };
      const report = verifyAgainstVectors(doc, candidate);
      expect(report.valid).toBe(false);
      expect(report.mismatches).toEqual([
        { caseIndex: 1, output: 'out', kind: 'different', expected: '0u8', actual: '255u8' },
      ]);
    });

    it('should record candidate failures per case', () => {
      const report = verifyAgainstVectors(doc, () => {
        throw new FHEProgramError('circuit failed', FHEProgramErrorCode.UNSUPPORTED_OPERATION);
      });
      expect(report.errors).toEqual([
        { caseIndex: 0, message: 'circuit failed' },
        { caseIndex: 1, message: 'circuit failed' },
      ]);
    });

    it('should list missing and unexpected outputs', () => {
      const mismatches = compareOutputs(new Map([['out', u8(1)]]), new Map([['other', u8(1)]]));
      expect(mismatches).toEqual([
        { output: 'out', kind: 'missing', expected: '1u8' },
        { output: 'other', kind: 'unexpected', actual: '1u8' },
      ]);
    });

    it('should decode a case for a candidate', () => {
      expect(caseInputs(doc, 1).get('a')).toEqual(u8(255));
      expect(() => caseInputs(doc, 5)).toThrow('Test vector case 5 does not exist (2 cases)');
    });
  });
});
