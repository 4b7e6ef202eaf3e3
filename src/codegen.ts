#!/usr/bin/env node

/**
 * Transfer syntax codegen CLI.
 *
 * Regenerates the transfer syntax header from its mustache template and
 * rewrites the forward/reverse mapping switches of the patch target, both
 * from the JSON table named in the configuration.
 *
 * Usage:
 *   transfer-syntax-codegen [--config <path>] [--check] [template|patch|all]
 */

import { formatFailure, parseArgs, runCodegen } from "./codegen/index.js";

function main(): void {
  try {
    process.exitCode = runCodegen(parseArgs(process.argv.slice(2)));
  } catch (err) {
    console.error(formatFailure(err));
    process.exitCode = 1;
  }
}

main();
