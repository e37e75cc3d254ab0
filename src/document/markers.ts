/**
 * Marker-driven segmentation.
 *
 * Authors delimit the parts of a document with paragraphs consisting of a
 * single token:
 *
 *   start_page_copy ... end_page_copy
 *   start_disclaimer ... end_disclaimer
 *
 * Marker paragraphs are stripped from the output; the remaining paragraphs
 * are covered by ordered, non-overlapping, non-empty regions. Everything
 * outside a marked range is an "unmarked" region.
 *
 * Markers never nest. Unbalanced markers produce structural warnings and
 * the parser recovers: processing of the document always continues.
 */

import type { RegionKind } from "../config/standards/enums.js";
import { paragraphText, type Document, type Paragraph, type Region } from "./types.js";

export type MarkerToken =
  | "start_page_copy"
  | "end_page_copy"
  | "start_disclaimer"
  | "end_disclaimer";

type MarkedKind = Exclude<RegionKind, "unmarked">;

interface OpenRegion {
  kind: MarkedKind;
  /** First kept paragraph of the region */
  start: number;
  token: MarkerToken;
  paragraphIndex: number;
}

const MARKERS: Readonly<Record<MarkerToken, { kind: MarkedKind; opens: boolean }>> = {
  start_page_copy: { kind: "page_copy", opens: true },
  end_page_copy: { kind: "page_copy", opens: false },
  start_disclaimer: { kind: "disclaimer", opens: true },
  end_disclaimer: { kind: "disclaimer", opens: false },
};

function isMarkerToken(value: string): value is MarkerToken {
  return Object.prototype.hasOwnProperty.call(MARKERS, value);
}

/**
 * Marker token of a paragraph, if its trimmed text is one
 * (case-insensitive).
 */
export function markerToken(paragraph: Paragraph): MarkerToken | null {
  const text = paragraphText(paragraph).trim().toLowerCase();
  return isMarkerToken(text) ? text : null;
}

export type StructuralWarningCode = "unmatched_end" | "unclosed_start" | "nested_start";

export interface StructuralWarning {
  readonly kind: "structural_warning";
  readonly code: StructuralWarningCode;
  readonly token: MarkerToken;
  /** Index of the marker paragraph in the input document */
  readonly paragraphIndex: number;
  readonly message: string;
}

export interface RemovedMarker {
  readonly token: MarkerToken;
  /** Index of the marker paragraph in the input document */
  readonly paragraphIndex: number;
}

export interface MarkerParseResult {
  /** Input document without its marker paragraphs */
  readonly document: Document;
  /** Regions over `document`, in order, covering every paragraph */
  readonly regions: readonly Region[];
  readonly markers: readonly RemovedMarker[];
  readonly warnings: readonly StructuralWarning[];
}

/**
 * Split a document into regions and strip its marker paragraphs.
 */
export function parseRegions(document: Document): MarkerParseResult {
  const kept: Paragraph[] = [];
  const marked: Region[] = [];
  const markers: RemovedMarker[] = [];
  const warnings: StructuralWarning[] = [];

  const state: { open: OpenRegion | null } = { open: null };

  const close = (end: number): void => {
    const open = state.open;
    if (open && end > open.start) {
      marked.push({ kind: open.kind, start: open.start, end });
    }
    state.open = null;
  };

  document.paragraphs.forEach((paragraph, index) => {
    const token = markerToken(paragraph);
    if (token === null) {
      kept.push(paragraph);
      return;
    }

    markers.push({ token, paragraphIndex: index });
    const marker = MARKERS[token];
    const open = state.open;

    if (marker.opens) {
      if (open) {
        warnings.push({
          kind: "structural_warning",
          code: "nested_start",
          token,
          paragraphIndex: index,
          message: `"${token}" at paragraph ${index} while "${open.token}" (paragraph ${open.paragraphIndex}) is still open; closing it here`,
        });
        close(kept.length);
      }
      state.open = { kind: marker.kind, start: kept.length, token, paragraphIndex: index };
      return;
    }

    if (open && open.kind === marker.kind) {
      close(kept.length);
      return;
    }

    warnings.push({
      kind: "structural_warning",
      code: "unmatched_end",
      token,
      paragraphIndex: index,
      message: `"${token}" at paragraph ${index} has no matching start marker; ignored`,
    });
  });

  const dangling = state.open;
  if (dangling) {
    warnings.push({
      kind: "structural_warning",
      code: "unclosed_start",
      token: dangling.token,
      paragraphIndex: dangling.paragraphIndex,
      message: `"${dangling.token}" at paragraph ${dangling.paragraphIndex} is never closed; region runs to the end of the document`,
    });
    close(kept.length);
  }

  return {
    document: { ...document, paragraphs: kept },
    regions: fillUnmarked(marked, kept.length),
    markers,
    warnings,
  };
}

/**
 * Cover the gaps between marked regions with unmarked ones.
 */
function fillUnmarked(marked: readonly Region[], paragraphCount: number): Region[] {
  const regions: Region[] = [];
  let cursor = 0;

  for (const region of marked) {
    if (region.start > cursor) {
      regions.push({ kind: "unmarked", start: cursor, end: region.start });
    }
    regions.push(region);
    cursor = region.end;
  }

  if (paragraphCount > cursor) {
    regions.push({ kind: "unmarked", start: cursor, end: paragraphCount });
  }

  return regions;
}

/**
 * Region containing a paragraph of the stripped document.
 */
export function regionOf(regions: readonly Region[], paragraphIndex: number): Region | undefined {
  return regions.find((region) => paragraphIndex >= region.start && paragraphIndex < region.end);
}
