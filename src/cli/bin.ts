#!/usr/bin/env node
/**
 * @file cli/bin.ts
 * @brief Executable entry for fhe-ref
 */

import { main } from './cli';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
