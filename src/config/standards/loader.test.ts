/**
 * Standards configuration tests.
 *
 * Run: node --import tsx src/config/standards/loader.test.ts
 *
 * Tests cover:
 *   1. Defaults: the built-in configuration loads and is frozen
 *   2. Schema errors: structured, path-addressed issues
 *   3. Cross-field checks: duplicates and non-idempotent tables
 *   4. File loading: unreadable and malformed files
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  DEFAULT_STANDARDS_CONFIG,
  loadStandardsConfig,
  loadStandardsConfigFromFile,
  validateStandardsConfig,
  StandardsConfigError,
  type StandardsConfigInput,
} from "./index.js";

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

function expectConfigError(input: unknown): StandardsConfigError {
  try {
    loadStandardsConfig(input);
  } catch (err) {
    if (err instanceof StandardsConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected StandardsConfigError");
}

const ALL_ENABLED = {
  state_abbreviations: { enabled: true },
  punctuation: { enabled: true },
  digital_terms: { enabled: true },
  times: { enabled: true },
  numbers: { enabled: true },
  healthcare_terms: { enabled: true },
  branding: { enabled: true },
  final_validation: { enabled: true },
};

function minimal(overrides: Partial<StandardsConfigInput> = {}): StandardsConfigInput {
  return { categories: ALL_ENABLED, ...overrides };
}

const TMP_DIR = join(tmpdir(), `standards-loader-test-${process.pid}`);
mkdirSync(TMP_DIR, { recursive: true });

// ═══════════════════════════════════════════════════════════════════════════
// 1. DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

section("Defaults");

test("built-in configuration loads", () => {
  const config = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);
  assert.equal(config.categories.numbers.enabled, true);
  assert.equal(config.digitalTerms.length, 8);
  assert.equal(config.numbers.thousandsThreshold, 1000);
});

test("loaded configuration is deep frozen", () => {
  const config = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.categories.times));
  assert.ok(Object.isFrozen(config.digitalTerms[0]));
});

test("omitted sections take their defaults", () => {
  const config = loadStandardsConfig(minimal());
  assert.deepEqual(config.categories.times.appliesTo, ["page_copy", "disclaimer", "unmarked"]);
  assert.deepEqual(config.exclusions, []);
  assert.equal(config.protectMarkup, true);
  assert.deepEqual(config.numbers, {
    spellOutMax: 9,
    thousandsThreshold: 1000,
    yearRange: { min: 1900, max: 2099 },
    phoneDigitThreshold: 10,
  });
  assert.deepEqual(config.branding, { terms: [], trademarks: [] });
  assert.deepEqual(config.targets, { keywords: [] });
});

test("trademark symbol defaults to ®", () => {
  const config = loadStandardsConfig(minimal({ branding: { trademarks: [{ term: "Acme" }] } }));
  assert.equal(config.branding.trademarks[0].symbol, "®");
});

test("target tolerances default to 50 words and 1 grade", () => {
  const config = loadStandardsConfig(
    minimal({ targets: { wordCount: { target: 400 }, readingLevel: { target: 8 } } })
  );
  assert.deepEqual(config.targets.wordCount, { target: 400, tolerance: 50 });
  assert.deepEqual(config.targets.readingLevel, { target: 8, tolerance: 1 });
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. SCHEMA ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Schema errors");

test("missing category is reported by path", () => {
  const { times: _times, ...rest } = ALL_ENABLED;
  const error = expectConfigError({ categories: rest });
  assert.equal(error.issues.length, 1);
  assert.deepEqual(error.issues[0].path, ["categories", "times"]);
});

test("unknown keys are rejected", () => {
  const error = expectConfigError({ ...minimal(), colour: "blue" });
  assert.equal(error.issues[0].code, "unrecognized_keys");
});

test("unknown region kind is rejected", () => {
  const error = expectConfigError({
    categories: { ...ALL_ENABLED, numbers: { enabled: true, appliesTo: ["footer"] } },
  });
  assert.deepEqual(error.issues[0].path, ["categories", "numbers", "appliesTo", 0]);
});

test("term with identical from and to is rejected", () => {
  const error = expectConfigError(minimal({ digitalTerms: [{ from: "email", to: "email" }] }));
  assert.equal(error.issues[0].message, "from and to must differ");
});

test("invalid custom rule pattern is reported on the pattern field", () => {
  const error = expectConfigError(
    minimal({
      customRules: [{ name: "broken", category: "punctuation", pattern: "(", replacement: "" }],
    })
  );
  assert.deepEqual(error.issues[0].path, ["customRules", 0, "pattern"]);
  assert.ok(error.issues[0].message.startsWith("invalid regular expression"));
});

test("custom rule flags are limited to i, m, s and u", () => {
  const error = expectConfigError(
    minimal({
      customRules: [{ name: "sticky", category: "punctuation", pattern: "x", flags: "y", replacement: "" }],
    })
  );
  assert.deepEqual(error.issues[0].path, ["customRules", 0, "flags"]);
});

test("invalid exclusion pattern is rejected", () => {
  const error = expectConfigError(minimal({ exclusionPatterns: ["[a-"] }));
  assert.deepEqual(error.issues[0].path, ["exclusionPatterns"]);
});

test("format() lists every issue with its path", () => {
  const error = expectConfigError(minimal({ numbers: { spellOutMax: 12 } }));
  assert.equal(
    error.format(),
    "Standards configuration validation failed:\n  - numbers.spellOutMax: Number must be less than or equal to 9"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. CROSS-FIELD CHECKS
// ═══════════════════════════════════════════════════════════════════════════

section("Cross-field checks");

test("duplicate term is rejected regardless of case", () => {
  const error = expectConfigError(
    minimal({
      digitalTerms: [
        { from: "e-mail", to: "email" },
        { from: "E-Mail", to: "email" },
      ],
    })
  );
  assert.equal(error.issues.length, 1);
  assert.equal(error.issues[0].code, "duplicate");
  assert.deepEqual(error.issues[0].path, ["digitalTerms", 1, "from"]);
});

test("brand terms are compared case-sensitively", () => {
  const config = loadStandardsConfig(
    minimal({
      branding: {
        terms: [
          { from: "acme", to: "Acme" },
          { from: "ACME", to: "Acme" },
        ],
      },
    })
  );
  assert.equal(config.branding.terms.length, 2);
});

test("replacement that is itself a term is rejected", () => {
  const error = expectConfigError(
    minimal({
      healthcareTerms: [
        { from: "healthcare", to: "health care" },
        { from: "health care", to: "care" },
      ],
    })
  );
  assert.equal(error.issues.length, 1);
  assert.equal(error.issues[0].code, "not_idempotent");
  assert.deepEqual(error.issues[0].path, ["healthcareTerms", 0, "to"]);
});

test("duplicate trademark is rejected", () => {
  const error = expectConfigError(
    minimal({ branding: { trademarks: [{ term: "Acme" }, { term: "Acme", symbol: "™" }] } })
  );
  assert.deepEqual(error.issues[0].path, ["branding", "trademarks", 1, "term"]);
});

test("duplicate custom rule in one category is rejected", () => {
  const rule = { name: "dup", category: "times", pattern: "x", replacement: "y" } as const;
  const error = expectConfigError(minimal({ customRules: [rule, rule] }));
  assert.equal(error.issues[0].message, 'duplicate custom rule "times/dup"');
});

test("validateStandardsConfig reports without throwing", () => {
  const result = validateStandardsConfig(minimal({ numbers: { thousandsThreshold: 10 } }));
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0].path, ["numbers", "thousandsThreshold"]);

  const ok = validateStandardsConfig(minimal());
  assert.equal(ok.success, true);
  assert.equal(ok.config?.categories.branding.enabled, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// 4. FILE LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("File loading");

test("configuration loads from a JSON file", () => {
  const path = join(TMP_DIR, "standards.json");
  writeFileSync(path, JSON.stringify(minimal({ exclusions: ["AT&T"] })));
  const config = loadStandardsConfigFromFile(path);
  assert.deepEqual(config.exclusions, ["AT&T"]);
});

test("missing file is an io_error", () => {
  try {
    loadStandardsConfigFromFile(join(TMP_DIR, "missing.json"));
    assert.fail("expected an error");
  } catch (err) {
    assert.ok(err instanceof StandardsConfigError);
    assert.equal(err.issues[0].code, "io_error");
  }
});

test("malformed JSON is an invalid_json error", () => {
  const path = join(TMP_DIR, "broken.json");
  writeFileSync(path, "{ categories: ");
  try {
    loadStandardsConfigFromFile(path);
    assert.fail("expected an error");
  } catch (err) {
    assert.ok(err instanceof StandardsConfigError);
    assert.equal(err.issues[0].code, "invalid_json");
  }
});

test("shipped sample configuration is valid", () => {
  const config = loadStandardsConfigFromFile(new URL("../../../config/standards.json", import.meta.url).pathname);
  assert.deepEqual(config.categories.numbers.appliesTo, ["page_copy", "unmarked"]);
  assert.equal(config.customRules[0].name, "toll-free");
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TMP_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
