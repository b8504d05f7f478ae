// language/index.ts

import * as path from "path";
import { ScriptSyntax } from "../types/tags";
import { PythonSyntax } from "./syntax_python";

const PYTHON = new PythonSyntax();

/**
 * ALL_SYNTAXES: map from language identifier → ScriptSyntax instance.
 * Currently only "python" is registered.
 */
export const ALL_SYNTAXES: { [lang: string]: ScriptSyntax } = {
  python: PYTHON,
};

/** Used for files given explicitly whose extension no adapter claims. */
export const DEFAULT_SYNTAX: ScriptSyntax = PYTHON;

/**
 * getSyntaxForFile(filePath):
 *   Return the adapter whose supportedExtensions() contains the file's
 *   (lowercased) extension, or undefined when none does.
 */
export function getSyntaxForFile(filePath: string): ScriptSyntax | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return Object.values(ALL_SYNTAXES).find((syntax) =>
    syntax.supportedExtensions().includes(ext)
  );
}

/**
 * collectExtensions(syntaxes):
 *   Return a de-duplicated array of all extensions supported by these adapters.
 *   Lowercases everything to keep consistency.
 */
export function collectExtensions(syntaxes: ScriptSyntax[]): string[] {
  const extSet = new Set<string>();
  for (const syntax of syntaxes) {
    for (const ext of syntax.supportedExtensions()) {
      extSet.add(ext.toLowerCase());
    }
  }
  return Array.from(extSet);
}
