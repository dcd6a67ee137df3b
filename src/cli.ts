#!/usr/bin/env node

/**
 * container-inventory CLI
 *
 *   collect [--pretty]            Print one inventory sweep as JSON
 *   serve [--port N] [--host H]   Start the HTTP API
 */

import { EXIT_INVALID, EXIT_OK, main } from "./commands/index.js";

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== EXIT_OK) process.exit(code);
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(EXIT_INVALID);
  },
);
