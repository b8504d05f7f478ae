// core/documentation.ts

import * as fs from "fs";
import * as path from "path";
import { ALL_SYNTAXES, DEFAULT_SYNTAX, getSyntaxForFile } from "../language";
import { ScriptSyntax, TestCaseRecord } from "../types/tags";
import { ExcelReportWriter, ReportWriter } from "./excel_writer";
import { FileScannerCore } from "./file_scanner_core";
import { assembleRecords, flattenRecords } from "./record_assembler";
import { extractFragments } from "./tag_extractor";

/**
 * InvalidPathError: the input path does not exist, or is neither a file nor a directory.
 * Raised before anything is written.
 */
export class InvalidPathError extends Error {
  constructor(readonly inputPath: string, options?: { cause?: unknown }) {
    super(`Invalid path: ${inputPath}`, options);
    this.name = "InvalidPathError";
  }
}

export interface DocumentationOptions {
  /** Directory the workbook is written to (defaults to process.cwd()). */
  outputDir?: string;
  readFile?: (filePath: string) => Promise<string>;
  writer?: ReportWriter;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface DocumentationSummary {
  outputPath: string;
  /** Display names of the files that were read, in processing order. */
  files: string[];
  skipped: SkippedFile[];
  records: TestCaseRecord[];
  rows: number;
}

interface ScriptTarget {
  filePath: string;
  displayName: string;
  syntax: ScriptSyntax;
}

/**
 * readUtf8Strict(filePath):
 *   Read a file as UTF-8, rejecting bytes that are not valid UTF-8 instead of
 *   replacing them.
 */
export async function readUtf8Strict(filePath: string): Promise<string> {
  const buffer = await fs.promises.readFile(filePath);
  return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
}

/**
 * outputFileName(inputPath):
 *   "<input name>_test_documentation.xlsx", where the input name is the last
 *   segment of the resolved path without its extension.
 */
export function outputFileName(inputPath: string): string {
  return `${path.parse(path.resolve(inputPath)).name}_test_documentation.xlsx`;
}

function toTarget(filePath: string, displayName: string): ScriptTarget {
  return { filePath, displayName, syntax: getSyntaxForFile(filePath) ?? DEFAULT_SYNTAX };
}

async function resolveTargets(inputPath: string): Promise<ScriptTarget[]> {
  const resolved = path.resolve(inputPath);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(resolved);
  } catch (err) {
    throw new InvalidPathError(inputPath, { cause: err });
  }

  if (stat.isFile()) {
    return [toTarget(resolved, path.basename(resolved))];
  }
  if (!stat.isDirectory()) {
    throw new InvalidPathError(inputPath);
  }

  const syntaxes = Object.values(ALL_SYNTAXES);
  console.log(`🔧 Active syntaxes: ${syntaxes.map((syntax) => syntax.name).join(", ")}`);
  console.log(`🔍 Scanning ${resolved} for test scripts…`);
  const scanner = new FileScannerCore({ rootDir: resolved, syntaxes });
  const files = await scanner.scan();
  console.log(`➡️  Found ${files.length} test script(s)`);

  return files.map((filePath) =>
    toTarget(filePath, path.relative(resolved, filePath).split(path.sep).join("/"))
  );
}

/**
 * generateDocumentation(inputPath, options):
 *   1. Resolve the input to one file or the test scripts under a directory.
 *   2. Read, extract and assemble each file in turn; unreadable files are
 *      warned about and skipped.
 *      Functions documented without a description or without steps are noted.
 *   3. Flatten every record into rows and write the workbook.
 */
export async function generateDocumentation(
  inputPath: string,
  options: DocumentationOptions = {}
): Promise<DocumentationSummary> {
  const readFile = options.readFile ?? readUtf8Strict;
  const writer = options.writer ?? new ExcelReportWriter();
  const outputDir = options.outputDir ?? process.cwd();

  const targets = await resolveTargets(inputPath);

  const files: string[] = [];
  const skipped: SkippedFile[] = [];
  const records: TestCaseRecord[] = [];

  for (const target of targets) {
    let text: string;
    try {
      text = await readFile(target.filePath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️  Skipping unreadable file ${target.displayName}: ${reason}`);
      skipped.push({ file: target.displayName, reason });
      continue;
    }

    files.push(target.displayName);
    const fileRecords = assembleRecords(extractFragments(text, target.syntax), target.displayName);
    for (const record of fileRecords) {
      if (!record.description) {
        console.log(`ℹ️  No description found for '${record.functionName}' in ${record.file}`);
      }
      if (record.pairs.length === 0) {
        console.log(`ℹ️  No steps or expected outputs found for '${record.functionName}' in ${record.file}`);
      }
    }
    records.push(...fileRecords);
  }

  const rows = flattenRecords(records);
  const outputPath = path.join(outputDir, outputFileName(inputPath));
  await writer.write(rows, outputPath);

  console.log(`✅ ${records.length} test case(s) in ${rows.length} row(s) written to ${outputPath}`);
  return { outputPath, files, skipped, records, rows: rows.length };
}
