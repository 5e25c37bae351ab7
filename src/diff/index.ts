export { structuralDiff, MAX_DIFF_EDITS } from "./structural.js";
export { diffLines, type DiffOptions, type LineEdit, type LineOp } from "./myers.js";
