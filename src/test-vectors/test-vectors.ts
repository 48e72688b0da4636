/**
 * @file test-vectors/test-vectors.ts
 * @brief Plaintext test vectors for compiler-equivalence checking
 *
 * A test-vector document records, for one program, a list of input sets and
 * the outputs the reference evaluator produced for them. A compiled circuit
 * is correct when decrypting its outputs for the same inputs yields exactly
 * these values.
 *
 * Envelope:
 *
 *   { "magic": "FHTV", "version": 1, "program": "...", "fingerprint": "sha256:...", "cases": [...] }
 *
 * Versioning is strict: only documents whose version equals
 * TEST_VECTOR_VERSION are read. The header is checked before the payload.
 */

import { z } from 'zod';
import { FHEProgramError, FHEProgramErrorCode, TypeMismatchError } from '../api/errors';
import type { CheckedProgram } from '../checker/capability-checker';
import { evaluate, toInputMap, type EvaluationInputs } from '../evaluator/reference-evaluator';
import { programFingerprint } from '../program/document';
import {
  decodeValueMap,
  encodeValueMap,
  EncodedValueSchema,
  type EncodedValue,
} from '../values/codec';
import { formatValue, valueEquals } from '../values/construct';
import type { Value } from '../values/types';

export const TEST_VECTOR_MAGIC = 'FHTV';
export const TEST_VECTOR_VERSION = 1;

// ============================================================================
// Types
// ============================================================================

export interface TestVectorCase {
  inputs: Record<string, EncodedValue>;
  outputs: Record<string, EncodedValue>;
}

export interface TestVectorDocument {
  magic: typeof TEST_VECTOR_MAGIC;
  version: number;
  program: string;
  fingerprint: string;
  cases: TestVectorCase[];
}

export type MismatchKind = 'missing' | 'unexpected' | 'different';

export interface OutputMismatch {
  output: string;
  kind: MismatchKind;
  expected?: string;
  actual?: string;
}

export interface CaseMismatch extends OutputMismatch {
  caseIndex: number;
}

export interface VectorVerificationReport {
  valid: boolean;
  fingerprintMatches: boolean;
  casesChecked: number;
  mismatches: CaseMismatch[];
  /** Cases whose candidate run failed outright */
  errors: { caseIndex: number; message: string }[];
}

const HeaderSchema = z.object({
  magic: z.string(),
  version: z.number().int().nonnegative(),
});

const CaseSchema = z
  .object({
    inputs: z.record(EncodedValueSchema),
    outputs: z.record(EncodedValueSchema),
  })
  .strict();

const DocumentSchema = z
  .object({
    magic: z.literal(TEST_VECTOR_MAGIC),
    version: z.literal(TEST_VECTOR_VERSION),
    program: z.string(),
    fingerprint: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    cases: z.array(CaseSchema),
  })
  .strict();

function serializationError(message: string, details?: Record<string, unknown>): FHEProgramError {
  return new FHEProgramError(message, FHEProgramErrorCode.SERIALIZATION_ERROR, details);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw serializationError(`Test vectors are not valid JSON: ${reason}`);
  }
}

// ============================================================================
// Header
// ============================================================================

function readHeader(raw: unknown): number {
  if (typeof raw !== 'object' || raw === null || !('magic' in raw)) {
    throw serializationError('Test vectors are missing their header');
  }
  const header = HeaderSchema.safeParse(raw);
  if (!header.success) {
    throw serializationError('Test vector version field is corrupt or unreadable');
  }
  if (header.data.magic !== TEST_VECTOR_MAGIC) {
    throw serializationError(`Invalid magic ${JSON.stringify(header.data.magic)}, expected ${TEST_VECTOR_MAGIC}`);
  }
  return header.data.version;
}

/**
 * Read only the header and return the document's version
 */
export function peekTestVectorVersion(text: string): number {
  return readHeader(parseJson(text));
}

// ============================================================================
// Generation and (De)serialization
// ============================================================================

/**
 * Evaluate every input set and record the outputs. All-or-nothing: the first
 * failing input set aborts generation.
 */
export function generateTestVectors(
  checked: CheckedProgram,
  inputSets: readonly EvaluationInputs[]
): TestVectorDocument {
  const cases = inputSets.map((inputs): TestVectorCase => {
    const result = evaluate(checked, inputs);
    if (!result.ok) {
      throw result.error;
    }
    return {
      inputs: encodeValueMap(toInputMap(inputs)),
      outputs: encodeValueMap(result.outputs),
    };
  });

  return {
    magic: TEST_VECTOR_MAGIC,
    version: TEST_VECTOR_VERSION,
    program: checked.program.name,
    fingerprint: programFingerprint(checked.program),
    cases,
  };
}

export function serializeTestVectors(doc: TestVectorDocument): string {
  return JSON.stringify(doc, null, 2);
}

/**
 * Parse a test-vector document, checking the header before the payload
 */
export function parseTestVectors(text: string): TestVectorDocument {
  const raw = parseJson(text);
  const version = readHeader(raw);
  if (version !== TEST_VECTOR_VERSION) {
    throw serializationError(`Unsupported test vector version ${version}, expected ${TEST_VECTOR_VERSION}`, {
      got: version,
      expected: TEST_VECTOR_VERSION,
    });
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw serializationError(`Test vector payload is invalid: ${reason}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

// ============================================================================
// Equivalence Checking
// ============================================================================

/**
 * Compare produced outputs against expected ones, in expected order, then
 * report any extra outputs
 */
export function compareOutputs(
  expected: ReadonlyMap<string, Value>,
  actual: ReadonlyMap<string, Value>
): OutputMismatch[] {
  const mismatches: OutputMismatch[] = [];

  for (const [name, want] of expected) {
    const got = actual.get(name);
    if (got === undefined) {
      mismatches.push({ output: name, kind: 'missing', expected: formatValue(want) });
    } else if (!valueEquals(want, got)) {
      mismatches.push({ output: name, kind: 'different', expected: formatValue(want), actual: formatValue(got) });
    }
  }
  for (const [name, got] of actual) {
    if (!expected.has(name)) {
      mismatches.push({ output: name, kind: 'unexpected', actual: formatValue(got) });
    }
  }
  return mismatches;
}

/**
 * Run a candidate implementation (a compiled circuit's decrypted results,
 * or another evaluator) over every case and compare with the recorded outputs
 */
export function verifyAgainstVectors(
  doc: TestVectorDocument,
  candidate: (inputs: ReadonlyMap<string, Value>) => ReadonlyMap<string, Value>
): VectorVerificationReport {
  const mismatches: CaseMismatch[] = [];
  const errors: { caseIndex: number; message: string }[] = [];

  doc.cases.forEach((testCase, caseIndex) => {
    let expected: Map<string, Value>;
    let actual: ReadonlyMap<string, Value>;
    try {
      expected = decodeValueMap(testCase.outputs);
      actual = candidate(decodeValueMap(testCase.inputs));
    } catch (error) {
      if (!(error instanceof FHEProgramError)) throw error;
      errors.push({ caseIndex, message: error.message });
      return;
    }
    for (const mismatch of compareOutputs(expected, actual)) {
      mismatches.push({ caseIndex, ...mismatch });
    }
  });

  return {
    valid: mismatches.length === 0 && errors.length === 0,
    fingerprintMatches: true,
    casesChecked: doc.cases.length,
    mismatches,
    errors,
  };
}

/**
 * Re-evaluate every recorded case with the reference evaluator
 */
export function verifyTestVectors(checked: CheckedProgram, doc: TestVectorDocument): VectorVerificationReport {
  const fingerprintMatches = doc.fingerprint === programFingerprint(checked.program);

  const report = verifyAgainstVectors(doc, (inputs) => {
    const result = evaluate(checked, inputs);
    if (!result.ok) throw result.error;
    return result.outputs;
  });

  return {
    ...report,
    fingerprintMatches,
    valid: report.valid && fingerprintMatches,
  };
}

/**
 * Decode one case's inputs, for callers feeding them to a candidate
 */
export function caseInputs(doc: TestVectorDocument, caseIndex: number): Map<string, Value> {
  const testCase = doc.cases[caseIndex];
  if (testCase === undefined) {
    throw new TypeMismatchError(`Test vector case ${caseIndex} does not exist (${doc.cases.length} cases)`);
  }
  return decodeValueMap(testCase.inputs);
}
