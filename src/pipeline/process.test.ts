/**
 * Document pipeline tests.
 *
 * Run: node --import tsx src/pipeline/process.test.ts
 *
 * Tests cover:
 *   1. Rewriting: formatting fidelity, category ordering, committed spans
 *   2. Regions: scoping, marker removal, structural warnings
 *   3. Failures: conflicts, invariant violations, residual findings
 *   4. Idempotence and reporting
 */

import { strict as assert } from "node:assert";

import { DEFAULT_STANDARDS_CONFIG, loadStandardsConfig, type StandardsConfig } from "../config/standards/index.js";
import { InvariantViolationError, rewriteParagraph, type ParagraphRewriter } from "../document/rewriter.js";
import { paragraphText, type Document, type Formatting, type Paragraph } from "../document/types.js";
import type { LogContext, Logger, LogLevel } from "../logging/logger.js";
import { buildRuleSet, rulesFor } from "../rules/ruleset.js";
import type { Candidate } from "../rules/types.js";
import { summarizeChanges } from "./changes.js";
import { processDocument, remapSpan } from "./process.js";
import type { ProcessResult, ReplacementEntry } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const BOLD: Formatting = { bold: true };
const PLAIN: Formatting = {};

function doc(...texts: string[]): Document {
  return { paragraphs: texts.map((text) => ({ runs: [{ text, formatting: {} }] })) };
}

function texts(result: ProcessResult): string[] {
  return result.document.paragraphs.map(paragraphText);
}

function replacements(result: ProcessResult): ReplacementEntry[] {
  return result.changes.filter((entry): entry is ReplacementEntry => entry.kind === "replacement");
}

function withConfig(overrides: Record<string, unknown>): StandardsConfig {
  return loadStandardsConfig({ ...DEFAULT_STANDARDS_CONFIG, ...overrides });
}

function run(document: Document, config: StandardsConfig = defaults, rewriter?: ParagraphRewriter): ProcessResult {
  return processDocument(document, buildRuleSet(config), config, { rewriter });
}

interface Recorded {
  level: LogLevel;
  message: string;
  context: LogContext;
}

function recordingLogger(entries: Recorded[]): Logger {
  const log = (level: LogLevel) => (message: string, context: LogContext = {}) => {
    entries.push({ level, message, context });
  };
  const logger: Logger = {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: () => logger,
  };
  return logger;
}

const defaults = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);

// ═══════════════════════════════════════════════════════════════════════════
// 1. REWRITING
// ═══════════════════════════════════════════════════════════════════════════

section("Rewriting");

test("state abbreviation between bold runs keeps the runs", () => {
  const input: Document = {
    paragraphs: [
      {
        runs: [
          { text: "Call ", formatting: BOLD },
          { text: "N.Y.", formatting: PLAIN },
          { text: " office", formatting: BOLD },
        ],
      },
    ],
  };
  const result = run(input);

  assert.deepEqual(
    result.document.paragraphs[0].runs.map((r) => [r.text, r.formatting]),
    [
      ["Call ", BOLD],
      ["NY", PLAIN],
      [" office", BOLD],
    ]
  );
  assert.deepEqual(result.changes, [
    {
      kind: "replacement",
      category: "state_abbreviations",
      rule: "state_abbreviations/postal-codes",
      paragraphIndex: 0,
      regionKind: "unmarked",
      start: 5,
      end: 9,
      before: "N.Y.",
      after: "NY",
    },
  ]);
});

test("small numbers spelled out, large ones grouped", () => {
  const result = run(doc("I have 3 children and 15000 members", "Ages 12 and up"));
  assert.deepEqual(texts(result), ["I have three children and 15,000 members", "Ages 12 and up"]);
  assert.deepEqual(
    replacements(result).map((entry) => entry.rule),
    ["numbers/spell-out", "numbers/thousands-separators"]
  );
});

test("times are claimed before numbers see their digits", () => {
  const result = run(doc("Open 8 AM-5 PM", "Meeting at 3:00 PM"));
  assert.deepEqual(texts(result), ["Open 8 am–5 pm", "Meeting at 3 pm"]);
  assert.deepEqual(
    replacements(result).map((entry) => entry.category),
    ["times", "times"]
  );
});

test("dotted time ranges keep their digits from the numbers pass", () => {
  const result = run(doc("Open 8 a.m.-5 p.m. Saturday", "Call 8:00 a.m. - 5:00 p.m. or 3 PM-5 PM."));
  assert.deepEqual(texts(result), ["Open 8 am–5 pm Saturday", "Call 8 am–5 pm or 3 pm–5 pm."]);
  assert.deepEqual(result.issues, []);
  assert.deepEqual(result.residuals, []);
});

test("a proper noun after a state code or time does not keep the period", () => {
  const result = run(doc("Visit the N.Y. Department of Health today.", "Our N.J. Transit office opens at 3 p.m. Monday"));
  assert.deepEqual(texts(result), [
    "Visit the NY Department of Health today.",
    "Our NJ Transit office opens at 3 pm Monday",
  ]);
});

test("trademark goes on the first mention in the document only", () => {
  const config = withConfig({ branding: { terms: [], trademarks: [{ term: "Acme" }] } });
  const result = run(doc("Acme plans", "More Acme plans"), config);
  assert.deepEqual(texts(result), ["Acme® plans", "More Acme plans"]);
});

test("excluded terms are left alone", () => {
  const result = run(doc("Tom & Jerry & friends"), withConfig({ exclusions: ["Tom & Jerry"] }));
  assert.deepEqual(texts(result), ["Tom & Jerry and friends"]);
});

test("disabled categories do nothing", () => {
  const categories = Object.fromEntries(
    Object.entries(DEFAULT_STANDARDS_CONFIG.categories).map(([category, settings]) => [
      category,
      { ...settings, enabled: false },
    ])
  );
  const input = doc("Call N.Y. at 3:00 PM & e-mail 3 times");
  const result = run(input, withConfig({ categories }));
  assert.deepEqual(texts(result), ["Call N.Y. at 3:00 PM & e-mail 3 times"]);
  assert.deepEqual(result.changes, []);
  assert.deepEqual(result.residuals, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. REGIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Regions");

test("category scoped away from disclaimers leaves them untouched", () => {
  const config = withConfig({
    categories: {
      ...DEFAULT_STANDARDS_CONFIG.categories,
      punctuation: { enabled: true, appliesTo: ["page_copy", "unmarked"] },
    },
  });
  const result = run(doc("Intro & overview", "start_disclaimer", "Tom & Jerry", "end_disclaimer"), config);

  assert.deepEqual(texts(result), ["Intro and overview", "Tom & Jerry"]);
  assert.deepEqual(result.regions, [
    { kind: "unmarked", start: 0, end: 1 },
    { kind: "disclaimer", start: 1, end: 2 },
  ]);
  assert.deepEqual(result.residuals, []);
});

test("mentions outside the branding scope do not use up the first mention", () => {
  const config = withConfig({
    categories: {
      ...DEFAULT_STANDARDS_CONFIG.categories,
      branding: { enabled: true, appliesTo: ["page_copy", "unmarked"] },
    },
    branding: { terms: [], trademarks: [{ term: "ExampleHealth" }] },
  });
  const result = run(
    doc("start_disclaimer", "ExampleHealth is a registered mark.", "end_disclaimer", "Welcome to ExampleHealth."),
    config
  );
  assert.deepEqual(texts(result), ["ExampleHealth is a registered mark.", "Welcome to ExampleHealth®."]);
});

test("removed markers are logged as changes", () => {
  const result = run(doc("start_page_copy", "Body", "end_page_copy"));
  assert.deepEqual(result.changes, [
    { kind: "marker_removed", token: "start_page_copy", paragraphIndex: 0 },
    { kind: "marker_removed", token: "end_page_copy", paragraphIndex: 2 },
  ]);
  assert.deepEqual(texts(result), ["Body"]);
});

test("stray end marker is reported and processing continues", () => {
  const entries: Recorded[] = [];
  const config = defaults;
  const result = processDocument(doc("Body with 3 items", "end_page_copy"), buildRuleSet(config), config, {
    logger: recordingLogger(entries),
  });

  assert.deepEqual(texts(result), ["Body with three items"]);
  assert.equal(result.issues.length, 1);
  assert.deepEqual(result.issues[0], {
    kind: "structural_warning",
    code: "unmatched_end",
    token: "end_page_copy",
    paragraphIndex: 1,
    message: '"end_page_copy" at paragraph 1 has no matching start marker; ignored',
  });
  assert.ok(entries.some((entry) => entry.level === "warn" && entry.context.code === "unmatched_end"));
  assert.ok(entries.some((entry) => entry.level === "info" && entry.message === "Document processed"));
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Failures");

const overlapping = withConfig({
  customRules: [{ name: "and-company", category: "punctuation", pattern: "& Co\\b", replacement: "and Company" }],
});

test("overlapping candidates skip the region for that category", () => {
  const result = run(doc("Tom & Jerry", "Smith & Co today"), overlapping);

  assert.deepEqual(texts(result), ["Tom & Jerry", "Smith & Co today"]);
  assert.deepEqual(result.issues, [
    {
      kind: "conflicting_matches",
      category: "punctuation",
      regionKind: "unmarked",
      paragraphIndex: 1,
      rules: ["punctuation/ampersand", "punctuation/and-company"],
      message:
        "punctuation/ampersand [6, 7) overlaps punctuation/and-company [6, 10) in paragraph 1; " +
        "punctuation skipped for the unmarked region",
    },
  ]);
});

test("skipped matches are reported as residual findings", () => {
  const result = run(doc("Tom & Jerry", "Smith & Co today"), overlapping);
  assert.deepEqual(
    result.residuals.map((finding) => [finding.rule, finding.paragraphIndex, finding.text, finding.suggestion]),
    [
      ["punctuation/ampersand", 0, "&", "and"],
      ["punctuation/ampersand", 1, "&", "and"],
      ["punctuation/and-company", 1, "& Co", "and Company"],
    ]
  );
});

test("conflict in one region does not affect another", () => {
  const result = run(doc("Smith & Co today", "start_page_copy", "Tom & Jerry", "end_page_copy"), overlapping);
  assert.deepEqual(texts(result), ["Smith & Co today", "Tom and Jerry"]);
});

test("faulty rewrite restores the paragraph and quarantines it", () => {
  const garbling: ParagraphRewriter = (paragraph: Paragraph, edits) =>
    paragraphText(paragraph).includes("N.Y.")
      ? { ...paragraph, runs: [{ text: "garbled", formatting: {} }] }
      : rewriteParagraph(paragraph, edits);

  const result = run(doc("Call N.Y. office with 3 kids", "I have 3 kids"), defaults, garbling);

  assert.deepEqual(texts(result), ["Call N.Y. office with 3 kids", "I have three kids"]);
  assert.deepEqual(result.issues, [
    {
      kind: "invariant_violation",
      category: "state_abbreviations",
      paragraphIndex: 0,
      message: 'Rewritten runs spell "garbled", expected "Call NY office with 3 kids"',
    },
  ]);
  assert.deepEqual(
    replacements(result).map((entry) => entry.paragraphIndex),
    [1]
  );
  assert.deepEqual(result.residuals, []);
});

test("invariant error thrown by the rewriter is handled the same way", () => {
  const throwing: ParagraphRewriter = () => {
    throw new InvariantViolationError("expected", "actual");
  };
  const result = run(doc("Tom & Jerry"), defaults, throwing);
  assert.deepEqual(texts(result), ["Tom & Jerry"]);
  assert.equal(result.issues[0].kind, "invariant_violation");
  assert.equal(result.issues[0].message, 'Rewritten runs spell "actual", expected "expected"');
});

test("other rewriter errors propagate", () => {
  const broken: ParagraphRewriter = () => {
    throw new TypeError("boom");
  };
  assert.throws(() => run(doc("Tom & Jerry"), defaults, broken), TypeError);
});

// ═══════════════════════════════════════════════════════════════════════════
// 4. IDEMPOTENCE AND REPORTING
// ═══════════════════════════════════════════════════════════════════════════

section("Idempotence and reporting");

test("processing the output again changes nothing", () => {
  const config = withConfig({
    branding: { terms: [{ from: "Example Health", to: "ExampleHealth" }], trademarks: [{ term: "ExampleHealth" }] },
  });
  const input = doc(
    "Example Health offers healthcare in N.Y. & N.J.",
    "Call 8 AM-5 PM about 3 plans for 15000 members.",
    "Send an E-mail to Example Health."
  );
  const first = run(input, config);
  assert.deepEqual(texts(first), [
    "ExampleHealth® offers health care in NY and NJ.",
    "Call 8 am–5 pm about three plans for 15,000 members.",
    "Send an Email to ExampleHealth.",
  ]);

  const second = run(first.document, config);
  assert.deepEqual(texts(second), texts(first));
  assert.deepEqual(replacements(second), []);
  assert.deepEqual(second.residuals, []);
});

test("corrections are counted by category in application order", () => {
  const result = run(doc("start_page_copy", "I have 3 kids & 4 cats in N.Y.", "end_page_copy"));
  assert.deepEqual(texts(result), ["I have three kids and four cats in NY."]);
  assert.deepEqual(summarizeChanges(result.changes), {
    total: 4,
    byCategory: [
      { category: "state_abbreviations", count: 1 },
      { category: "punctuation", count: 1 },
      { category: "numbers", count: 2 },
    ],
  });
  assert.deepEqual(summarizeChanges([]), { total: 0, byCategory: [] });
});

test("remapSpan shifts, keeps and widens spans", () => {
  const rule = rulesFor(buildRuleSet(defaults), "punctuation")[0];
  const edit = (start: number, end: number, replacement: string): Candidate => ({
    rule,
    start,
    end,
    original: "x".repeat(end - start),
    replacement,
  });

  assert.deepEqual(remapSpan({ start: 10, end: 14 }, [edit(2, 5, "x")]), { start: 8, end: 12 });
  assert.deepEqual(remapSpan({ start: 10, end: 14 }, [edit(20, 22, "")]), { start: 10, end: 14 });
  assert.deepEqual(remapSpan({ start: 10, end: 14 }, [edit(12, 16, "xy")]), { start: 10, end: 14 });
  assert.deepEqual(remapSpan({ start: 10, end: 14 }, [edit(0, 1, "abc"), edit(12, 16, "")]), {
    start: 12,
    end: 14,
  });
});

test("report carries analysis and target comparison", () => {
  const config = withConfig({ targets: { wordCount: { target: 100 }, keywords: ["office"] } });
  const result = run(doc("Call N.Y. office"), config);

  assert.equal(result.report.analysis.wordCount, 3);
  assert.deepEqual(result.report.analysis.keywords.map((k) => [k.keyword, k.count]), [["office", 1]]);
  assert.deepEqual(result.report.targets.wordCount, { target: 100, actual: 3, difference: -97, status: "under" });
  assert.equal(result.report.targets.readingLevel, undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
