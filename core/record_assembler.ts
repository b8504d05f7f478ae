// core/record_assembler.ts

import { ReportRow, StepPair, TagFragment, TestCaseRecord } from "../types/tags";

/**
 * REPORT_COLUMNS: header labels, in the order ReportRow cells are written.
 */
export const REPORT_COLUMNS = [
  { header: "File", key: "file" },
  { header: "Function", key: "functionName" },
  { header: "Description", key: "description" },
  { header: "Precondition", key: "precondition" },
  { header: "Step", key: "step" },
  { header: "Expected Output", key: "expectedOutput" },
] as const satisfies ReadonlyArray<{ header: string; key: keyof ReportRow }>;

interface FunctionGroup {
  description?: string;
  precondition?: string;
  steps: string[];
  expectedOutputs: string[];
}

/**
 * pairPositionally(steps, outputs):
 *   Zip the Nth step with the Nth expected output; the shorter list is
 *   padded with "".
 */
export function pairPositionally(steps: string[], outputs: string[]): StepPair[] {
  const pairs: StepPair[] = [];
  const count = Math.max(steps.length, outputs.length);
  for (let n = 0; n < count; n++) {
    pairs.push({ step: steps[n] ?? "", expectedOutput: outputs[n] ?? "" });
  }
  return pairs;
}

/**
 * assembleRecords(fragments, file):
 *   One record per function name, in the order the names were first seen.
 *   Description and Precondition are first-wins. Functions without any
 *   fragment never appear here, so they produce no record.
 */
export function assembleRecords(fragments: Iterable<TagFragment>, file: string): TestCaseRecord[] {
  const groups = new Map<string, FunctionGroup>();

  for (const fragment of fragments) {
    let group = groups.get(fragment.functionName);
    if (!group) {
      group = { steps: [], expectedOutputs: [] };
      groups.set(fragment.functionName, group);
    }

    switch (fragment.kind) {
      case "description":
        group.description ??= fragment.text;
        break;
      case "precondition":
        group.precondition ??= fragment.text;
        break;
      case "step":
        group.steps.push(fragment.text);
        break;
      case "expectedOutput":
        group.expectedOutputs.push(fragment.text);
        break;
    }
  }

  return Array.from(groups, ([functionName, group]) => ({
    file,
    functionName,
    description: group.description ?? "",
    precondition: group.precondition ?? "",
    pairs: pairPositionally(group.steps, group.expectedOutputs),
  }));
}

/**
 * flattenRecords(records):
 *   One row per step/output pair (one row when a record has none). Only the
 *   first row of a record names its file, function, description and
 *   precondition; continuation rows leave those cells blank.
 */
export function flattenRecords(records: TestCaseRecord[]): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const record of records) {
    const pairs: StepPair[] = record.pairs.length > 0 ? record.pairs : [{ step: "", expectedOutput: "" }];
    pairs.forEach((pair, index) => {
      const first = index === 0;
      rows.push({
        file: first ? record.file : "",
        functionName: first ? record.functionName : "",
        description: first ? record.description : "",
        precondition: first ? record.precondition : "",
        step: pair.step,
        expectedOutput: pair.expectedOutput,
      });
    });
  }
  return rows;
}
