/**
 * @file program/index.ts
 * @brief Program representation exports
 */

export * from './types';
export { Program, createProgram, type ResolvedOperation } from './program';
export { inferResultType, type InferenceInput } from './infer';
export { ProgramBuilder, type OperandInput, type OperationOptions } from './builder';
export {
  ProgramDocumentSchema,
  definitionToDocument,
  documentToDefinition,
  loadProgram,
  parseProgramDocument,
  programFingerprint,
  serializeProgram,
  type ProgramDocument,
} from './document';
