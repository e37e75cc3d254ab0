/**
 * Run-preserving rewriter.
 *
 * Replacing text in a paragraph's concatenated string would lose the
 * boundaries between runs. Instead the paragraph is flattened into
 * (character, formatting) cells, edits are spliced in from right to left so
 * earlier offsets stay valid, and the cells are coalesced back into runs.
 *
 * Formatting policy:
 * - Untouched characters keep the descriptor of the run that covered them.
 * - Replacement text takes the descriptor of the first character it
 *   replaces. An insertion (empty span) takes the descriptor of the
 *   character before it, or of the character after it at offset 0.
 * - Adjacent characters with equal descriptors form a single run.
 */

import {
  paragraphText,
  sameFormatting,
  type Formatting,
  type Paragraph,
  type Run,
} from "./types.js";

/**
 * Replacement of the span [start, end) of a paragraph's text.
 * Offsets are UTF-16 code unit indices, as produced by RegExp.
 */
export interface TextEdit {
  readonly start: number;
  readonly end: number;
  readonly replacement: string;
}

/**
 * Two edits claim overlapping text. Raised instead of silently picking a
 * winner: overlapping edits are a rule-authoring defect.
 */
export class ConflictingMatchesError extends Error {
  public readonly first: TextEdit;
  public readonly second: TextEdit;

  constructor(first: TextEdit, second: TextEdit) {
    super(
      `Edits [${first.start}, ${first.end}) and [${second.start}, ${second.end}) overlap`
    );
    this.name = "ConflictingMatchesError";
    this.first = first;
    this.second = second;
  }
}

/**
 * The rebuilt runs do not spell the expected text.
 */
export class InvariantViolationError extends Error {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Rewritten runs spell ${JSON.stringify(actual)}, expected ${JSON.stringify(expected)}`);
    this.name = "InvariantViolationError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Signature shared by rewriteParagraph and test doubles. */
export type ParagraphRewriter = (paragraph: Paragraph, edits: readonly TextEdit[]) => Paragraph;

interface Cell {
  readonly char: string;
  readonly formatting: Formatting;
}

const NO_FORMATTING: Formatting = Object.freeze({});

function flatten(runs: readonly Run[]): Cell[] {
  const cells: Cell[] = [];
  for (const run of runs) {
    for (let i = 0; i < run.text.length; i++) {
      cells.push({ char: run.text[i], formatting: run.formatting });
    }
  }
  return cells;
}

/**
 * Merge consecutive cells with equal formatting. Each run keeps the
 * descriptor object of its first cell.
 */
function coalesce(cells: readonly Cell[]): Run[] {
  const runs: Run[] = [];
  let text = "";
  let formatting: Formatting | null = null;

  for (const cell of cells) {
    if (formatting !== null && sameFormatting(formatting, cell.formatting)) {
      text += cell.char;
      continue;
    }
    if (formatting !== null) {
      runs.push({ text, formatting });
    }
    text = cell.char;
    formatting = cell.formatting;
  }

  if (formatting !== null) {
    runs.push({ text, formatting });
  }
  return runs;
}

/**
 * Sort edits by position and verify they are in range and disjoint.
 */
export function orderEdits<E extends TextEdit>(edits: readonly E[], length: number): E[] {
  const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);

  for (const edit of sorted) {
    if (
      !Number.isInteger(edit.start) ||
      !Number.isInteger(edit.end) ||
      edit.start < 0 ||
      edit.end < edit.start ||
      edit.end > length
    ) {
      throw new RangeError(
        `Edit [${edit.start}, ${edit.end}) is outside the paragraph text (length ${length})`
      );
    }
  }

  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const next = sorted[i];
    const sameInsertionPoint =
      prev.start === prev.end && next.start === next.end && prev.start === next.start;
    if (next.start < prev.end || sameInsertionPoint) {
      throw new ConflictingMatchesError(prev, next);
    }
  }

  return sorted;
}

/**
 * Apply ordered edits to a plain string.
 */
export function applyEditsToText(text: string, edits: readonly TextEdit[]): string {
  let result = text;
  for (let i = edits.length - 1; i >= 0; i--) {
    const edit = edits[i];
    result = result.slice(0, edit.start) + edit.replacement + result.slice(edit.end);
  }
  return result;
}

function inheritedFormatting(cells: readonly Cell[], edit: TextEdit): Formatting {
  if (edit.end > edit.start) {
    return cells[edit.start].formatting;
  }
  const neighbour = edit.start > 0 ? cells[edit.start - 1] : cells[edit.start];
  return neighbour?.formatting ?? NO_FORMATTING;
}

/**
 * Rewrite a paragraph, keeping each character's formatting.
 *
 * @throws ConflictingMatchesError when two edits overlap
 * @throws RangeError when an edit lies outside the text
 * @throws InvariantViolationError when the rebuilt runs do not spell the
 *   expected text
 */
export function rewriteParagraph(paragraph: Paragraph, edits: readonly TextEdit[]): Paragraph {
  const text = paragraphText(paragraph);
  const ordered = orderEdits(edits, text.length);
  if (ordered.length === 0) {
    return paragraph;
  }

  const cells = flatten(paragraph.runs);

  for (let i = ordered.length - 1; i >= 0; i--) {
    const edit = ordered[i];
    const formatting = inheritedFormatting(cells, edit);
    const inserted = Array.from({ length: edit.replacement.length }, (_, k) => ({
      char: edit.replacement[k],
      formatting,
    }));
    cells.splice(edit.start, edit.end - edit.start, ...inserted);
  }

  const runs = coalesce(cells);
  const expected = applyEditsToText(text, ordered);
  const actual = runs.map((run) => run.text).join("");
  if (actual !== expected) {
    throw new InvariantViolationError(expected, actual);
  }

  return { ...paragraph, runs };
}

/**
 * Merge adjacent runs with equal formatting and drop empty ones without
 * changing the text.
 */
export function normalizeRuns(paragraph: Paragraph): Paragraph {
  return { ...paragraph, runs: coalesce(flatten(paragraph.runs)) };
}
