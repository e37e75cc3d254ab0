/**
 * Word lists shipped in data/ at the repository root.
 * Read once on first use and validated like any other input.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const StateCodesFileSchema = z.object({
  description: z.string().optional(),
  codes: z.array(z.string().regex(/^[A-Z]{2}$/)).min(1),
});

const StopWordsFileSchema = z.object({
  description: z.string().optional(),
  words: z.array(z.string().min(1)).min(1),
});

function readDataFile<T>(name: string, schema: z.ZodType<T>): T {
  const url = new URL(`../../data/${name}`, import.meta.url);
  const result = schema.safeParse(JSON.parse(readFileSync(url, "utf-8")));
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid data file ${name}: ${details.join("; ")}`);
  }
  return result.data;
}

let stateCodes: ReadonlySet<string> | null = null;
let stopWords: ReadonlySet<string> | null = null;

/** USPS two-letter codes of the states and DC. */
export function loadStateCodes(): ReadonlySet<string> {
  stateCodes ??= new Set(readDataFile("state-codes.json", StateCodesFileSchema).codes);
  return stateCodes;
}

/** Lower-case English stop words excluded from keyword tables. */
export function loadStopWords(): ReadonlySet<string> {
  stopWords ??= new Set(
    readDataFile("stop-words.json", StopWordsFileSchema).words.map((word) => word.toLowerCase())
  );
  return stopWords;
}
