#!/usr/bin/env node
/**
 * wt - CLI Entry Point
 */

import { main } from './commands.js';

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
