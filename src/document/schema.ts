/**
 * JSON interchange format for documents.
 *
 * The CLI reads and writes documents in this shape; a container-format
 * loader (e.g. for .docx) is expected to produce the same structure.
 *
 *   {
 *     "paragraphs": [
 *       { "style": "Normal", "runs": [{ "text": "Call ", "formatting": { "bold": true } }] }
 *     ]
 *   }
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Document } from "./types.js";

export const FormattingSchema = z
  .object({
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    font: z.string().min(1).optional(),
    fontSize: z.number().positive().optional(),
    color: z
      .string()
      .regex(/^#?[0-9a-fA-F]{6}$|^auto$/, "color must be a hex RGB value or 'auto'")
      .optional(),
  })
  .strict();

export const RunSchema = z
  .object({
    text: z.string(),
    formatting: FormattingSchema.default({}),
  })
  .strict();

export const ParagraphSchema = z
  .object({
    style: z.string().min(1).optional(),
    runs: z.array(RunSchema),
  })
  .strict();

export const DocumentSchema = z
  .object({
    paragraphs: z.array(ParagraphSchema),
  })
  .strict();

export type DocumentInput = z.input<typeof DocumentSchema>;

export interface DocumentIssue {
  path: string;
  message: string;
}

export class DocumentFormatError extends Error {
  public readonly issues: DocumentIssue[];

  constructor(message: string, issues: DocumentIssue[]) {
    super(message);
    this.name = "DocumentFormatError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validate a raw value as a Document.
 *
 * @param input - Parsed JSON or a JSON string
 * @throws DocumentFormatError
 */
export function parseDocument(input: unknown): Document {
  let data = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new DocumentFormatError("Document is not valid JSON", [
        { path: "(root)", message: err instanceof Error ? err.message : String(err) },
      ]);
    }
  }

  const result = DocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    throw new DocumentFormatError(`Invalid document: ${issues.length} error(s)`, issues);
  }

  return result.data;
}

export function readDocumentFile(path: string): Document {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new DocumentFormatError(`Cannot read document: ${path}`, [
      { path: "(root)", message: err instanceof Error ? err.message : String(err) },
    ]);
  }
  return parseDocument(raw);
}

/**
 * Serialize a document, leaving out empty formatting objects and styles
 * that were never set.
 */
export function serializeDocument(document: Document): string {
  const plain = {
    paragraphs: document.paragraphs.map((paragraph) => ({
      ...(paragraph.style !== undefined ? { style: paragraph.style } : {}),
      runs: paragraph.runs.map((run) => {
        const formatting = Object.fromEntries(
          Object.entries(run.formatting).filter(([, value]) => value !== undefined)
        );
        return Object.keys(formatting).length > 0
          ? { text: run.text, formatting }
          : { text: run.text };
      }),
    })),
  };
  return JSON.stringify(plain, null, 2) + "\n";
}
