/**
 * Document model.
 *
 * A Document is an ordered list of Paragraphs; a Paragraph owns an ordered
 * list of Runs; a Run is text sharing one formatting descriptor. All values
 * are treated as immutable: rewriting produces new Paragraphs and never
 * touches the Runs it was given.
 */

import type { RegionKind } from "../config/standards/enums.js";

/**
 * Formatting descriptor of a Run. Every field is optional; an absent field
 * means "inherit from the paragraph style".
 */
export interface Formatting {
  readonly bold?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  readonly font?: string;
  readonly fontSize?: number;
  readonly color?: string;
}

export const FORMATTING_KEYS = [
  "bold",
  "italic",
  "underline",
  "font",
  "fontSize",
  "color",
] as const satisfies readonly (keyof Formatting)[];

export interface Run {
  readonly text: string;
  readonly formatting: Formatting;
}

export interface Paragraph {
  readonly runs: readonly Run[];
  /** Paragraph style name (e.g. "Heading 1"); carried through untouched */
  readonly style?: string;
}

export interface Document {
  readonly paragraphs: readonly Paragraph[];
}

/**
 * Contiguous paragraph range [start, end) of a marker-stripped document.
 */
export interface Region {
  readonly kind: RegionKind;
  readonly start: number;
  readonly end: number;
}

/** Paragraph text: the concatenation of its runs. */
export function paragraphText(paragraph: Paragraph): string {
  return paragraph.runs.map((run) => run.text).join("");
}

/** Document text with one line per paragraph. */
export function documentText(document: Document): string {
  return document.paragraphs.map(paragraphText).join("\n");
}

/**
 * Field-by-field equality of two descriptors. `undefined` and a missing
 * key are the same thing.
 */
export function sameFormatting(a: Formatting, b: Formatting): boolean {
  if (a === b) {
    return true;
  }
  return FORMATTING_KEYS.every((key) => a[key] === b[key]);
}
