/**
 * @file programs/index.ts
 * @brief Example program catalogue exports
 */

export { EXAMPLE_PROGRAMS, buildExamples, exampleNames, findExamples, type ExampleProgram } from './catalogue';
