/**
 * @file test-vectors/index.ts
 * @brief Test-vector exports
 */

export * from './test-vectors';
