/**
 * Batch processing tests.
 *
 * Run: node --import tsx src/pipeline/batch.test.ts
 */

import { strict as assert } from "node:assert";

import { DEFAULT_STANDARDS_CONFIG, loadStandardsConfig } from "../config/standards/index.js";
import { rewriteParagraph, type ParagraphRewriter } from "../document/rewriter.js";
import { paragraphText, type Document } from "../document/types.js";
import { buildRuleSet } from "../rules/ruleset.js";
import { processBatch, type BatchItem } from "./batch.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function doc(text: string): Document {
  return { paragraphs: [{ runs: [{ text, formatting: {} }] }] };
}

function item(name: string, text: string): BatchItem {
  return { name, document: doc(text) };
}

const config = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);
const ruleSet = buildRuleSet(config);

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

console.log("\n── Batch ──");

await test("every document is processed, results in input order", async () => {
  const batch = await processBatch(
    [item("a.json", "I have 3 kids"), item("b.json", "Tom & Jerry"), item("c.json", "Call N.Y.")],
    ruleSet,
    config,
    { concurrency: 2 }
  );

  assert.equal(batch.total, 3);
  assert.equal(batch.succeeded, 3);
  assert.deepEqual(
    batch.results.map((r) => (r.status === "success" ? paragraphText(r.result.document.paragraphs[0]) : r.status)),
    ["I have three kids", "Tom and Jerry", "Call NY."]
  );
});

await test("a failing document does not stop the others", async () => {
  const faulty: ParagraphRewriter = (paragraph, edits) => {
    if (paragraphText(paragraph).startsWith("boom")) {
      throw new TypeError("rewriter exploded");
    }
    return rewriteParagraph(paragraph, edits);
  };
  const batch = await processBatch(
    [item("ok.json", "Tom & Jerry"), item("bad.json", "boom & bust"), item("ok2.json", "3 cats")],
    ruleSet,
    config,
    { rewriter: faulty }
  );

  assert.deepEqual(
    [batch.succeeded, batch.failed, batch.skipped],
    [2, 1, 0]
  );
  const bad = batch.results[1];
  assert.equal(bad.status, "failed");
  assert.equal(bad.status === "failed" ? bad.error : "", "rewriter exploded");
});

await test("an aborted batch skips what it has not started", async () => {
  const controller = new AbortController();
  controller.abort();
  const batch = await processBatch([item("a.json", "one"), item("b.json", "two")], ruleSet, config, {
    signal: controller.signal,
  });
  assert.deepEqual(
    batch.results.map((r) => [r.name, r.status]),
    [
      ["a.json", "skipped"],
      ["b.json", "skipped"],
    ]
  );
  assert.equal(batch.skipped, 2);
});

await test("abort between documents keeps finished results", async () => {
  const controller = new AbortController();
  const aborting: ParagraphRewriter = (paragraph, edits) => {
    controller.abort();
    return rewriteParagraph(paragraph, edits);
  };
  const batch = await processBatch(
    [item("a.json", "Tom & Jerry"), item("b.json", "Tom & Jerry"), item("c.json", "Tom & Jerry")],
    ruleSet,
    config,
    { concurrency: 1, signal: controller.signal, rewriter: aborting }
  );
  assert.deepEqual(
    batch.results.map((r) => r.status),
    ["success", "skipped", "skipped"]
  );
});

await test("empty batch", async () => {
  const batch = await processBatch([], ruleSet, config);
  assert.deepEqual(batch, { total: 0, succeeded: 0, failed: 0, skipped: 0, results: [] });
});

await test("concurrency must be a positive integer", async () => {
  await assert.rejects(processBatch([], ruleSet, config, { concurrency: 0 }), RangeError);
  await assert.rejects(processBatch([], ruleSet, config, { concurrency: 1.5 }), RangeError);
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
