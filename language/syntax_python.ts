/**
 * @file language/syntax_python.ts
 * @description Script syntax adapter for Python test scripts (pytest/unittest style).
 */

import { ScriptSyntax } from "../types/tags";

/**
 * Implements the ScriptSyntax interface for Python sources.
 *
 * Function boundaries are `def name(` and `async def name(` at any indentation,
 * so methods of test classes are picked up the same way as module-level tests.
 *
 * @class PythonSyntax
 * @implements {ScriptSyntax}
 */
export class PythonSyntax implements ScriptSyntax {
  readonly name = "python";
  readonly lineComment = "#";
  readonly decorator = "@";
  readonly blockDelimiters = ['"""', "'''"] as const;
  readonly blockPrefix = /^[rRuUbBfF]{0,2}$/;

  private readonly functionPattern = /^\s*(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;

  /**
   * Returns the list of file extensions supported by this adapter.
   */
  supportedExtensions(): string[] {
    return [".py"];
  }

  /**
   * Test scripts are named `test_<something>.py`, the pytest discovery default.
   */
  isTestScript(fileName: string): boolean {
    return /^test_.*\.py$/i.test(fileName);
  }

  matchFunction(line: string): string | undefined {
    const match = this.functionPattern.exec(line);
    return match?.[1];
  }
}
