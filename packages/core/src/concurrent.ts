/**
 * Concurrent injection
 *
 * Every cell decision is a pure function of (seed, rowIndex, column, value),
 * so row ranges can be processed by independent worker units in any order.
 * Output rows are placed by position and partial summaries are summed, which
 * makes the result identical to `injectNulls` for any concurrency and chunk
 * size.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { logger } from "@nullmask/shared";
import type { RawInjectionConfig } from "./config.js";
import { NullInjector, createInjectionPlan } from "./injector.js";
import { createSummary, mergeSummaries } from "./summary.js";
import type { Dataset, InjectionResult, InjectionSummary, Row } from "./types.js";

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_CHUNK_SIZE = 1000;

export interface ConcurrentInjectionOptions {
  /** Number of worker units pulling chunks */
  concurrency?: number | undefined;
  /** Rows per chunk (the unit of work and of cancellation) */
  chunkSize?: number | undefined;
  /** Checked between chunks; an aborted run produces no output */
  signal?: AbortSignal | undefined;
  /** Called after each chunk completes */
  onProgress?: ((processedRows: number, totalRows: number) => void) | undefined;
}

interface Chunk {
  start: number;
  end: number;
}

function positiveInteger(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Split [0, total) into consecutive chunks
 */
export function planChunks(total: number, chunkSize: number): Chunk[] {
  const chunks: Chunk[] = [];
  for (let start = 0; start < total; start += chunkSize) {
    chunks.push({ start, end: Math.min(start + chunkSize, total) });
  }
  return chunks;
}

/**
 * Inject nulls with rows split across concurrent worker units.
 *
 * Validation runs once, before any chunk is scheduled.
 *
 * @throws ConfigError or SchemaMismatchError before any work starts
 * @throws RangeError if concurrency or chunkSize is not a positive integer
 * @throws the signal's reason if aborted
 */
export async function injectNullsConcurrently(
  dataset: Dataset,
  raw: RawInjectionConfig,
  options: ConcurrentInjectionOptions = {}
): Promise<InjectionResult> {
  const concurrency = positiveInteger(options.concurrency, DEFAULT_CONCURRENCY, "concurrency");
  const chunkSize = positiveInteger(options.chunkSize, DEFAULT_CHUNK_SIZE, "chunkSize");
  const { signal, onProgress } = options;

  signal?.throwIfAborted();

  const plan = createInjectionPlan(dataset, raw);
  const injector = new NullInjector(plan);
  const chunks = planChunks(dataset.rows.length, chunkSize);
  const total = dataset.rows.length;

  const output: Row[] = new Array<Row>(total);
  const partials: InjectionSummary[] = [];
  let nextChunk = 0;
  let processed = 0;

  const worker = async (): Promise<void> => {
    for (;;) {
      // Cancellation is only observed between chunks
      signal?.throwIfAborted();

      const chunk = chunks[nextChunk];
      nextChunk += 1;
      if (!chunk) {
        return;
      }

      const { rows, summary } = injector.injectRows(dataset.rows.slice(chunk.start, chunk.end), chunk.start);
      rows.forEach((row, offset) => {
        output[chunk.start + offset] = row;
      });
      partials.push(summary);

      processed += rows.length;
      onProgress?.(processed, total);

      await yieldToEventLoop();
    }
  };

  const workerCount = Math.min(concurrency, Math.max(chunks.length, 1));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  logger.debug(
    { rows: total, chunks: chunks.length, workers: workerCount },
    "Concurrent null injection complete"
  );

  const summary = partials.reduce(mergeSummaries, createSummary(plan.selector.columns));
  return { dataset: { columns: plan.schema, rows: output }, summary };
}
