#!/usr/bin/env node
/**
 * Normalize JSON documents against the copy standards.
 *
 * Usage:
 *   npx tsx src/cli/normalize.ts <document.json>... [options]
 *   npm run normalize -- <document.json>...
 *
 * Options:
 *   --config <path>       Standards configuration JSON (default: $STANDARDS_CONFIG, else built-in defaults)
 *   --out-dir <dir>       Where normalized documents are written (default: output/normalized)
 *   --concurrency <n>     Documents processed at once (default: $NORMALIZE_CONCURRENCY or 4)
 *   --run-id <id>         Tag log lines with this run ID instead of a generated one
 *   --append-report       Append the analysis report to each written document
 *   --json                Print the full result as JSON
 *   --quiet               Print failures only
 *   --verbose             Echo log lines to the console
 *   -h, --help            Show help
 *
 * Each document is written to <out-dir>/<basename>. Inputs that would
 * share an output file fail instead of overwriting each other.
 *
 * Exit codes:
 *   0 - Every document was normalized
 *   1 - A document failed, the configuration is invalid, or the arguments are wrong
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import {
  config,
  ConfigError,
  DEFAULT_STANDARDS_CONFIG,
  loadStandardsConfig,
  loadStandardsConfigFromFile,
  StandardsConfigError,
  validateConfig,
  type StandardsConfig,
} from "../config/index.js";
import { readDocumentFile, serializeDocument, DocumentFormatError } from "../document/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import { buildRuleSet } from "../rules/index.js";
import {
  processBatch,
  summarizeChanges,
  type BatchItem,
  type BatchItemResult,
  type ProcessResult,
} from "../pipeline/index.js";
import { appendAnalysisSection, formatSummary } from "../analysis/index.js";

// ============================================================
// Types
// ============================================================

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Overrides the logger built from the environment */
  logger?: Logger;
}

interface CliOptions {
  files: string[];
  configPath: string | null;
  outDir: string;
  concurrency: number;
  runId: string | undefined;
  appendReport: boolean;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

const USAGE = `
Usage: normalize <document.json>... [options]

Options:
  --config <path>       Standards configuration JSON (default: $STANDARDS_CONFIG, else built-in defaults)
  --out-dir <dir>       Where normalized documents are written (default: output/normalized)
  --concurrency <n>     Documents processed at once (default: $NORMALIZE_CONCURRENCY or 4)
  --run-id <id>         Tag log lines with this run ID instead of a generated one
  --append-report       Append the analysis report to each written document
  --json                Print the full result as JSON
  --quiet               Print failures only
  --verbose             Echo log lines to the console
  -h, --help            Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: "string" },
      "out-dir": { type: "string", default: "output/normalized" },
      concurrency: { type: "string" },
      "run-id": { type: "string" },
      "append-report": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      quiet: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  let concurrency = config.concurrency;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new TypeError(`--concurrency must be a positive integer, got: ${values.concurrency}`);
    }
  }

  return {
    files: positionals,
    configPath: values.config ?? config.standardsConfigPath,
    outDir: values["out-dir"] ?? "output/normalized",
    concurrency,
    runId: values["run-id"],
    appendReport: values["append-report"] ?? false,
    json: values.json ?? false,
    quiet: values.quiet ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

function loadStandards(path: string | null): StandardsConfig {
  return path === null
    ? loadStandardsConfig(DEFAULT_STANDARDS_CONFIG)
    : loadStandardsConfigFromFile(path);
}

// ============================================================
// Output Formatting
// ============================================================

function summaryOf(result: ProcessResult): string {
  return formatSummary(result.report.analysis, result.report.targets, summarizeChanges(result.changes));
}

function describeResult(name: string, result: ProcessResult): string[] {
  const lines: string[] = [];
  const replacements = result.changes.filter((entry) => entry.kind === "replacement");

  lines.push(`✓ ${name}: ${replacements.length} replacement(s), ${result.issues.length} issue(s), ${result.residuals.length} residual(s)`);

  for (const entry of result.changes) {
    if (entry.kind === "replacement") {
      lines.push(`  [${entry.rule}] paragraph ${entry.paragraphIndex}: "${entry.before}" → "${entry.after}"`);
    } else {
      lines.push(`  [marker] removed ${entry.token} (input paragraph ${entry.paragraphIndex})`);
    }
  }
  for (const issue of result.issues) {
    lines.push(`  ! ${issue.kind}: ${issue.message}`);
  }
  for (const finding of result.residuals) {
    lines.push(`  ? [${finding.rule}] paragraph ${finding.paragraphIndex}: "${finding.text}" → "${finding.suggestion}"`);
  }

  lines.push("");
  lines.push(summaryOf(result));
  return lines;
}

function outputPath(outDir: string, file: string): string {
  return join(outDir, basename(file));
}

/**
 * Inputs grouped by output file, for those output files claimed by more
 * than one input.
 */
function sharedOutputs(outDir: string, files: readonly string[]): Map<string, string[]> {
  const byOutput = new Map<string, string[]>();
  for (const file of files) {
    const output = outputPath(outDir, file);
    byOutput.set(output, [...(byOutput.get(output) ?? []), file]);
  }
  return new Map([...byOutput].filter(([, inputs]) => inputs.length > 1));
}

// ============================================================
// Main
// ============================================================

/**
 * Run the command. Returns the process exit code.
 */
export async function run(argv: string[], io: CliIo = { stdout: console.log, stderr: console.error }): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    io.stderr(USAGE);
    return 1;
  }

  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (options.files.length === 0) {
    io.stderr("No documents given.");
    io.stderr(USAGE);
    return 1;
  }

  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(err.message);
      return 1;
    }
    throw err;
  }

  const runId = initRunId(options.runId);
  const logger =
    io.logger ??
    createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "info",
      logDir: config.logDir,
      console: options.verbose,
    });

  let standards: StandardsConfig;
  try {
    standards = loadStandards(options.configPath);
  } catch (err) {
    if (err instanceof StandardsConfigError) {
      io.stderr(err.format());
      return 1;
    }
    throw err;
  }
  const ruleSet = buildRuleSet(standards);

  // Documents that fail before processing, by argument position
  const early = new Map<number, BatchItemResult>();
  const items: BatchItem[] = [];
  const shared = sharedOutputs(options.outDir, options.files);

  options.files.forEach((file, index) => {
    const output = outputPath(options.outDir, file);
    const sharing = shared.get(output);
    if (sharing) {
      const others = [...sharing];
      others.splice(others.indexOf(file), 1);
      early.set(index, {
        name: file,
        status: "failed",
        error: `Output path ${output} is shared with ${others.join(", ")}`,
        duration: 0,
      });
      return;
    }
    try {
      items.push({ name: file, document: readDocumentFile(file) });
    } catch (err) {
      if (!(err instanceof DocumentFormatError)) {
        throw err;
      }
      const detail = err.issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
      early.set(index, { name: file, status: "failed", error: `${err.message} (${detail})`, duration: 0 });
    }
  });

  logger.info("Normalize run", { runId, documents: options.files.length, config: options.configPath ?? "defaults" });

  const batch = await processBatch(items, ruleSet, standards, {
    concurrency: options.concurrency,
    logger,
  });

  if (batch.succeeded > 0) {
    mkdirSync(options.outDir, { recursive: true });
  }
  for (const outcome of batch.results) {
    if (outcome.status === "success") {
      const { result } = outcome;
      const written = options.appendReport ? appendAnalysisSection(result.document, summaryOf(result)) : result.document;
      writeFileSync(outputPath(options.outDir, outcome.name), serializeDocument(written));
    }
  }

  // Back into argument order; batch results keep the order of `items`
  let processed = 0;
  const outcomes = options.files.map(
    (_, index): BatchItemResult => early.get(index) ?? batch.results[processed++]
  );
  const failures = outcomes.filter((outcome) => outcome.status !== "success");

  if (options.json) {
    io.stdout(
      JSON.stringify(
        {
          runId,
          documents: outcomes.map((outcome) =>
            outcome.status === "success"
              ? {
                  name: outcome.name,
                  status: outcome.status,
                  output: outputPath(options.outDir, outcome.name),
                  changes: outcome.result.changes,
                  issues: outcome.result.issues,
                  residuals: outcome.result.residuals,
                  report: outcome.result.report,
                }
              : outcome
          ),
        },
        null,
        2
      )
    );
  } else {
    for (const outcome of outcomes) {
      if (outcome.status === "success") {
        if (!options.quiet) {
          describeResult(outcome.name, outcome.result).forEach((line) => io.stdout(line));
        }
      } else if (outcome.status === "failed") {
        io.stderr(`✗ ${outcome.name}: ${outcome.error}`);
      } else {
        io.stderr(`- ${outcome.name}: skipped`);
      }
    }
  }

  return failures.length > 0 ? 1 : 0;
}

const invokedDirectly =
  process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  run(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error("Unexpected error:", err);
      process.exit(1);
    });
}
