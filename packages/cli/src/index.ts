#!/usr/bin/env node
/**
 * docforge command line entry point
 *
 * Usage:
 *   npm run docforge -- build --config docforge.config.json
 *   npm run docforge -- clean
 */

import { main } from './cli.js';
import { consoleIo } from './io.js';

main(process.argv.slice(2), consoleIo).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exitCode = 1;
  }
);
