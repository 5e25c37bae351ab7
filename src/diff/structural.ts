import { kindOf, type ValueKind } from "../classify/kinds.js";
import { DEFAULT_DIFF_CONTEXT } from "../types/config.js";
import { toCanonical } from "../format/canonical.js";
import { diffLines, type LineEdit } from "./myers.js";

const DIFFABLE_KINDS: ReadonlySet<ValueKind> = new Set<ValueKind>([
  "sequence",
  "fixed-sequence",
  "set",
  "mapping",
]);

/**
 * Longest edit script worth rendering; beyond it the diff is skipped
 */
export const MAX_DIFF_EDITS = 500;

const PREFIX: Record<LineEdit["op"], string> = {
  equal: "  ",
  delete: "- ",
  insert: "+ ",
};

function toLines(value: unknown): string[] {
  return JSON.stringify(toCanonical(value), null, 2).split("\n");
}

/**
 * Keep every change plus `context` common lines on each side of it; longer
 * common runs collapse into a single "  ..." line
 */
function render(edits: LineEdit[], context: number): string[] {
  const keep = new Array<boolean>(edits.length).fill(false);
  edits.forEach((edit, i) => {
    if (edit.op === "equal") return;
    const from = Math.max(0, i - context);
    const to = Math.min(edits.length - 1, i + context);
    for (let j = from; j <= to; j++) keep[j] = true;
  });

  const out: string[] = [];
  let elided = false;
  edits.forEach((edit, i) => {
    if (keep[i]) {
      out.push(PREFIX[edit.op] + edit.line);
      elided = false;
    } else if (!elided) {
      out.push("  ...");
      elided = true;
    }
  });
  return out;
}

/**
 * Line diff of two sequences or two mappings of the same kind, for appending
 * to an equality failure. `-` lines belong to `actual`, `+` lines to
 * `expected`. Returns "" when the operands are not diffable or their
 * canonical forms are identical, and a one-line note when more than
 * `maxEdits` lines changed.
 */
export function structuralDiff(
  actual: unknown,
  expected: unknown,
  context: number = DEFAULT_DIFF_CONTEXT,
  maxEdits: number = MAX_DIFF_EDITS
): string {
  const kind = kindOf(actual);
  if (kind !== kindOf(expected) || !DIFFABLE_KINDS.has(kind)) {
    return "";
  }

  let actualLines: string[];
  let expectedLines: string[];
  try {
    actualLines = toLines(actual);
    expectedLines = toLines(expected);
  } catch {
    // a throwing getter leaves the failure message without a diff
    return "";
  }

  const edits = diffLines(actualLines, expectedLines, { maxD: maxEdits });
  if (!edits) {
    return ` - Diff: skipped, more than ${maxEdits} lines changed`;
  }
  if (edits.every((edit) => edit.op === "equal")) {
    return "";
  }
  return ` - Diff:\n${render(edits, context).join("\n")}`;
}
