/**
 * Batch normalization over a bounded worker pool.
 *
 * Documents are independent: they share the frozen rule set and config
 * and nothing else. A failing document is reported on its own; an aborted
 * batch reports every document it never started as skipped.
 */

import type { StandardsConfig } from "../config/standards/schema.js";
import type { Document } from "../document/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { RuleSet } from "../rules/ruleset.js";
import { processDocument, type ProcessOptions } from "./process.js";
import type { ProcessResult } from "./types.js";

export interface BatchItem {
  /** Label used in results and log lines, e.g. the file name */
  readonly name: string;
  readonly document: Document;
}

export type BatchItemResult =
  | { readonly name: string; readonly status: "success"; readonly result: ProcessResult; readonly duration: number }
  | { readonly name: string; readonly status: "failed"; readonly error: string; readonly duration: number }
  | { readonly name: string; readonly status: "skipped" };

export interface BatchResult {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  /** One entry per input item, in input order */
  readonly results: readonly BatchItemResult[];
}

export interface BatchOptions extends ProcessOptions {
  /** Maximum documents in flight (default 4) */
  concurrency?: number;
  /** Stops the batch between documents */
  signal?: AbortSignal;
}

const DEFAULT_CONCURRENCY = 4;

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function processBatch(
  items: readonly BatchItem[],
  ruleSet: RuleSet,
  config: StandardsConfig,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const logger = options.logger ?? silentLogger;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: (BatchItemResult | undefined)[] = items.map(() => undefined);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      await nextTick();
      if (options.signal?.aborted) {
        return;
      }
      const index = cursor++;
      if (index >= items.length) {
        return;
      }
      const item = items[index];
      const docLogger = logger.child({ document: item.name });
      const started = Date.now();

      try {
        const result = processDocument(item.document, ruleSet, config, {
          logger: docLogger,
          rewriter: options.rewriter,
        });
        results[index] = { name: item.name, status: "success", result, duration: Date.now() - started };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        docLogger.error("Document failed", { error: message });
        results[index] = { name: item.name, status: "failed", error: message, duration: Date.now() - started };
      }
    }
  };

  logger.info("Batch started", { documents: items.length, concurrency });
  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));

  const settled = results.map(
    (result, index): BatchItemResult => result ?? { name: items[index].name, status: "skipped" }
  );
  const summary: BatchResult = {
    total: items.length,
    succeeded: settled.filter((r) => r.status === "success").length,
    failed: settled.filter((r) => r.status === "failed").length,
    skipped: settled.filter((r) => r.status === "skipped").length,
    results: settled,
  };

  logger.info("Batch finished", {
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
  });
  return summary;
}
