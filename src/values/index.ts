/**
 * @file values/index.ts
 * @brief Value model exports
 */

export * from './types';
export * from './construct';
export * from './arithmetic';
export * from './codec';
