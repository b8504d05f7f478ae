// cli.ts

import yargs from "yargs";
import { generateDocumentation, DocumentationOptions, InvalidPathError } from "./core/documentation";

/** Bad command line: no path, more than one path, or an unknown option. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * runCli(args, options):
 *   Parse `args` (already stripped of the node binary and script path), run the
 *   documentation job and resolve to the process exit code.
 *
 *   0  success, including skipped files and files without tags
 *   1  usage error or invalid path; the message goes to stderr
 */
export async function runCli(args: string[], options: DocumentationOptions = {}): Promise<number> {
  let inputPath: string;
  try {
    const argv = yargs(args)
      .scriptName("testsheet")
      .usage("Usage: $0 <path>")
      .demandCommand(1, 1, "Missing <path>: a test script file or a directory.", "Expected exactly one <path>.")
      .strictOptions()
      .help()
      .alias("help", "h")
      .exitProcess(false)
      .fail((msg, err) => {
        throw msg ? new UsageError(msg) : err;
      })
      .parseSync();

    if (argv.help === true) return 0;
    inputPath = String(argv._[0]);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`❌ ${err.message}`);
      return 1;
    }
    throw err;
  }

  try {
    const summary = await generateDocumentation(inputPath, options);
    if (summary.skipped.length > 0) {
      console.warn(`⚠️  ${summary.skipped.length} file(s) could not be read and were skipped.`);
    }
    return 0;
  } catch (err) {
    if (err instanceof InvalidPathError) {
      console.error(`❌ ${err.message}`);
      return 1;
    }
    throw err;
  }
}
