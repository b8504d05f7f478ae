// core/tag_extractor.ts

import { DEFAULT_SYNTAX } from "../language";
import { ScriptSyntax, TagFragment, TagKind } from "../types/tags";

/**
 * Exact, case-sensitive labels and the fragment kind each one produces.
 */
export const TAG_LABELS = {
  Description: "description",
  Precondition: "precondition",
  Step: "step",
  "Expected Output": "expectedOutput",
} as const satisfies Record<string, TagKind>;

type TagLabel = keyof typeof TAG_LABELS;

const LABEL_SOURCE = "(Description|Precondition|Step|Expected Output)";

// Matched against the start of a (trimmed) comment body or block body.
const LABELLED_TEXT = new RegExp(`^${LABEL_SOURCE}\\s*:\\s*([\\s\\S]*)$`);

/** A recognised tag that has not been given an owning function yet. */
type PendingTag = Omit<TagFragment, "functionName">;

/**
 * ScanState: the per-file accumulator threaded through the scan.
 *
 * - functionName undefined means Outside-Function; any other value is the
 *   Inside-Function state for that function.
 * - held keeps Description/Precondition tags from the comment block above
 *   the next definition; they go to that definition, or to the current
 *   function once a code line shows the block was not a function header.
 */
interface ScanState {
  functionName: string | undefined;
  held: PendingTag[];
}

interface TripleQuotedBlock {
  content: string;
  endIndex: number; // 0-based index of the closing line
}

export function toLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n").split("\n");
}

function isTagLabel(value: string): value is TagLabel {
  return Object.prototype.hasOwnProperty.call(TAG_LABELS, value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * parseLabelled(body):
 *   Split "Label: text" into its kind and trimmed text, which may be empty.
 *   Returns undefined when the body does not start with a known label.
 */
function parseLabelled(body: string): { kind: TagKind; text: string } | undefined {
  const match = LABELLED_TEXT.exec(body.trimStart());
  if (!match) return undefined;
  const label = match[1] ?? "";
  const text = (match[2] ?? "").trim();
  if (!isTagLabel(label)) return undefined;
  return { kind: TAG_LABELS[label], text };
}

/**
 * readBlock(lines, start, syntax):
 *   If lines[start] opens a triple-quoted string, return its inner text (each
 *   line trimmed, joined by "\n") and the index of the closing line. Returns
 *   null when the line does not open a block, undefined when the block never
 *   closes.
 */
function readBlock(
  lines: string[],
  start: number,
  syntax: ScriptSyntax
): TripleQuotedBlock | null | undefined {
  const trimmed = (lines[start] ?? "").trim();

  for (const delimiter of syntax.blockDelimiters) {
    const at = trimmed.indexOf(delimiter);
    if (at < 0 || !syntax.blockPrefix.test(trimmed.slice(0, at))) continue;

    const body = trimmed.slice(at + delimiter.length);
    const closeAt = body.indexOf(delimiter);
    if (closeAt >= 0) {
      return { content: body.slice(0, closeAt).trim(), endIndex: start };
    }

    const parts = [body.trim()];
    for (let i = start + 1; i < lines.length; i++) {
      const line = (lines[i] ?? "").trim();
      const end = line.indexOf(delimiter);
      if (end >= 0) {
        parts.push(line.slice(0, end).trim());
        return { content: parts.join("\n"), endIndex: i };
      }
      parts.push(line);
    }
    return undefined;
  }

  return null;
}

/**
 * literalEnd(lines, start, syntax):
 *   A code line such as `sql = """` leaves a triple-quoted literal open when it
 *   holds an odd number of one delimiter. Returns the index of the line that
 *   closes it, or undefined when nothing is left open (or it never closes).
 */
function literalEnd(lines: string[], start: number, syntax: ScriptSyntax): number | undefined {
  const line = lines[start] ?? "";
  const delimiter = syntax.blockDelimiters.find((d) => (line.split(d).length - 1) % 2 === 1);
  if (delimiter === undefined) return undefined;

  for (let i = start + 1; i < lines.length; i++) {
    if ((lines[i] ?? "").includes(delimiter)) return i;
  }
  return undefined;
}

/**
 * scanFragments(lines, syntax):
 *   Single pass over the file. Every line is one of: a function definition,
 *   blank, a line comment, a decorator, the start of a triple-quoted block, or
 *   code. Only the last one closes a leading comment block.
 */
function* scanFragments(lines: string[], syntax: ScriptSyntax): Generator<TagFragment, void, undefined> {
  const state: ScanState = { functionName: undefined, held: [] };
  const commentPrefix = new RegExp(`^${escapeRegExp(syntax.lineComment)}\\s*`);

  function* release(): Generator<TagFragment, void, undefined> {
    const { functionName, held } = state;
    state.held = [];
    if (functionName === undefined) return; // nothing to attach to
    for (const tag of held) {
      yield { ...tag, functionName };
    }
  }

  function* accept(tag: PendingTag): Generator<TagFragment, void, undefined> {
    if (tag.kind === "description" || tag.kind === "precondition") {
      // Only filled-in descriptions and preconditions are kept.
      if (tag.text.length > 0) state.held.push(tag);
      return;
    }
    if (state.functionName !== undefined) {
      yield { ...tag, functionName: state.functionName };
    }
  }

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    const trimmed = line.trim();

    const definedName = syntax.matchFunction(line);
    if (definedName !== undefined) {
      state.functionName = definedName;
      yield* release();
      i++;
      continue;
    }

    if (trimmed.length === 0 || trimmed.startsWith(syntax.decorator)) {
      i++;
      continue;
    }

    if (trimmed.startsWith(syntax.lineComment)) {
      const parsed = parseLabelled(trimmed.replace(commentPrefix, ""));
      if (parsed) {
        yield* accept({ ...parsed, startLine: i + 1, endLine: i + 1 });
      }
      i++;
      continue;
    }

    const block = readBlock(lines, i, syntax);
    if (block === undefined) {
      // Unterminated string: not a tag, carry on with the next line.
      i++;
      continue;
    }
    if (block !== null) {
      const parsed = parseLabelled(block.content);
      if (parsed) {
        const text = parsed.text
          .split("\\n")
          .map((part) => part.trim())
          .join("\n")
          .trim();
        yield* accept({ kind: parsed.kind, text, startLine: i + 1, endLine: block.endIndex + 1 });
      }
      i = block.endIndex + 1;
      continue;
    }

    // Plain code line; a literal it opens is skipped up to its closing line.
    yield* release();
    i = (literalEnd(lines, i, syntax) ?? i) + 1;
  }

  // End of input closes the last open function.
  yield* release();
}

/**
 * extractFragments(text, syntax):
 *   Lazy view of every tag fragment in `text`, each owned by a function.
 *   Iterating again rescans from the start; nothing is shared between scans.
 *   Unrecognised lines never raise: they are simply not fragments.
 */
export function extractFragments(
  text: string,
  syntax: ScriptSyntax = DEFAULT_SYNTAX
): Iterable<TagFragment> {
  return {
    [Symbol.iterator]: () => scanFragments(toLines(text), syntax),
  };
}
