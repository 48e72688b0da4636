/**
 * @file checker/index.ts
 * @brief Capability checker exports
 */

export {
  CapabilityViolation,
  analyzeCapabilities,
  assertChecked,
  checkProgram,
  collectCapabilityViolations,
  isIssuedCheck,
  type CapabilityAnalysis,
  type CapabilityViolationInfo,
  type CheckError,
  type CheckOptions,
  type CheckResult,
  type CheckedProgram,
} from './capability-checker';
