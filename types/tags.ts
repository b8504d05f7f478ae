// types/tags.ts

/**
 * TagKind: the four structured labels recognised in test-script comments.
 */
export type TagKind = "description" | "precondition" | "step" | "expectedOutput";

/**
 * TagFragment: one parsed tag occurrence, owned by the function it documents.
 */
export interface TagFragment {
  readonly kind: TagKind;
  readonly text: string;
  readonly functionName: string;
  readonly startLine: number; // 1-based
  readonly endLine: number; // 1-based, inclusive
}

export interface StepPair {
  step: string;
  expectedOutput: string;
}

/**
 * TestCaseRecord: everything documented about one test function in one file.
 * Pairs keep source order; a missing side of a pair is "".
 */
export interface TestCaseRecord {
  file: string;
  functionName: string;
  description: string;
  precondition: string;
  pairs: StepPair[];
}

/**
 * ReportRow: one spreadsheet row. Continuation rows of a record leave
 * file, functionName, description and precondition blank.
 */
export interface ReportRow {
  file: string;
  functionName: string;
  description: string;
  precondition: string;
  step: string;
  expectedOutput: string;
}

/**
 * ScriptSyntax: adapter describing the surface syntax of one scripting language.
 * The tag extractor only needs to find function boundaries, comments,
 * decorators and triple-quoted blocks, so that is all an adapter exposes.
 */
export interface ScriptSyntax {
  /** Language identifier, e.g. "python". */
  readonly name: string;

  /** Return all lowercase extensions (including leading dot) that this adapter handles. */
  supportedExtensions(): string[];

  /** True when a bare file name follows the language's test-script naming convention. */
  isTestScript(fileName: string): boolean;

  /** Return the defined function's name if `line` opens a function, otherwise undefined. */
  matchFunction(line: string): string | undefined;

  readonly lineComment: string;
  readonly decorator: string;
  readonly blockDelimiters: readonly string[];
  /** Letters allowed in front of a block delimiter (string prefixes). */
  readonly blockPrefix: RegExp;
}
