/**
 * @file evaluator/index.ts
 * @brief Reference evaluator exports
 */

export {
  evaluate,
  evaluateBatch,
  evaluateOrThrow,
  executeOperation,
  toInputMap,
  type EvaluateOptions,
  type EvaluationError,
  type EvaluationInputs,
  type EvaluationResult,
} from './reference-evaluator';
