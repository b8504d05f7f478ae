#!/usr/bin/env node
// testsheet.ts

/**
 * Entry-point for the test documentation generator.
 *
 *   testsheet <path>
 *
 * <path> is a single test script, or a directory searched recursively for
 * test scripts (`test_*.py`). Tagged comments in each test function
 * (Description, Precondition, Step, Expected Output) are collected into
 * `<path name>_test_documentation.xlsx` in the current working directory.
 *
 * Exit code 0 on success, also when some files could not be read or no tags
 * were found; 1 when the path is invalid or the run fails.
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "./cli";

runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("❌ Uncaught error in testsheet:", err);
    process.exit(1);
  });
