/**
 * Walks an item list in fixed-size batches, appending each batch to a
 * sink and persisting the cursor only after the append succeeded.
 *
 * A crash between the append and the checkpoint save leaves the cursor at
 * the previous batch boundary; resuming re-fetches and re-appends that
 * batch, so rows for it appear twice (at-least-once).
 */

import { BatchTimer, formatDuration, planBatches } from "./batches.js";
import { errorMessage } from "./errors.js";
import { sleep as defaultSleep } from "./retry.js";
import type {
  BatchReport,
  BatchRunResult,
  Checkpoint,
  Item,
  ItemError,
  ItemErrorPolicy,
  ItemRecord,
  Logger,
  RecordParser,
  Sink,
} from "./types.js";

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_PAUSE_MS = 1_000;

export interface BatchRunOptions {
  items: readonly Item[];
  parser: RecordParser;
  sink: Sink;
  checkpoint: Checkpoint;
  /** Defaults to the stored cursor. */
  start?: number;
  /** Exclusive; defaults to `items.length`. */
  end?: number;
  batchSize?: number;
  /** Delay after every item fetch. */
  pauseMs?: number;
  onItemError?: ItemErrorPolicy;
  /** Checked before each batch; an aborted run stops at a batch boundary. */
  signal?: AbortSignal;
  /** Called once a batch is written and its cursor saved. */
  onBatch?: (report: BatchReport) => void;
}

export interface BatchProcessorDeps {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class BatchProcessor {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(deps: BatchProcessorDeps) {
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async run(opts: BatchRunOptions): Promise<BatchRunResult> {
    const { items, parser, sink, checkpoint, signal } = opts;
    const batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    const pauseMs = opts.pauseMs ?? DEFAULT_PAUSE_MS;
    const policy = opts.onItemError ?? "abort";
    const end = opts.end ?? items.length;

    if (!Number.isFinite(pauseMs) || pauseMs < 0) {
      throw new RangeError(`pauseMs must be >= 0, got ${pauseMs}`);
    }
    if (!Number.isInteger(end) || end > items.length) {
      throw new RangeError(
        `end ${end} is past the item list (${items.length} items)`,
      );
    }

    const stored = await checkpoint.load();
    const start = opts.start ?? stored;
    const batches = planBatches(start, end, batchSize);

    // The header follows the stored cursor, so a start override never truncates saved rows
    await sink.initialize(stored);
    this.logger.info(`Starting at index ${start}`, {
      end,
      batchSize,
      batches: batches.length,
    });

    const runStartedAt = this.now();
    const timer = new BatchTimer();
    const reports: BatchReport[] = [];
    const errors: ItemError[] = [];
    let cursor = start;
    let itemsWritten = 0;
    let interrupted = false;

    for (let i = 0; i < batches.length; i++) {
      if (signal?.aborted) {
        interrupted = true;
        this.logger.warn(`Stopping before batch ${i}, cursor stays at ${cursor}`);
        break;
      }

      const { start: batchStart, stop } = batches[i];
      const batchStartedAt = this.now();

      const records: ItemRecord[] = [];
      const batchErrors: ItemError[] = [];
      for (let index = batchStart; index < stop; index++) {
        const item = items[index];
        this.logger.progress(index + 1, end, "Items");
        try {
          records.push(await parser(item.id, item.name));
        } catch (err) {
          if (policy === "abort") {
            this.logger.error(`Failed on item ${index} (${item.id}), aborting run`, {
              error: errorMessage(err),
              cursor,
            });
            throw err;
          }
          batchErrors.push({ index, id: item.id, error: errorMessage(err) });
          this.logger.warn(`Skipping item ${index} (${item.id})`, {
            error: errorMessage(err),
          });
        }
        if (pauseMs > 0) await this.sleep(pauseMs);
      }

      await sink.append(records);
      await checkpoint.save(stop);
      itemsWritten += records.length;
      errors.push(...batchErrors);
      cursor = stop;
      this.logger.info(`Exported lines ${batchStart}-${stop - 1}`);

      const durationMs = this.now() - batchStartedAt;
      timer.record(durationMs);
      const remainingMs = timer.estimateRemaining(batches.length - i - 1);
      const report: BatchReport = {
        index: i,
        start: batchStart,
        stop,
        recordsWritten: records.length,
        errors: batchErrors,
        durationMs,
        meanMs: timer.meanMs,
        remainingMs,
      };
      reports.push(report);
      opts.onBatch?.(report);
      this.logger.info(
        `Batch ${i} time: ${formatDuration(durationMs)} (avg: ${formatDuration(timer.meanMs)}, remaining: ${formatDuration(remainingMs)})`,
      );
    }

    this.logger.info(
      `Processing batches ${interrupted ? "stopped" : "complete"}. ${itemsWritten} items written`,
    );

    return {
      start,
      end,
      cursor,
      itemsWritten,
      itemsFailed: errors.length,
      errors,
      batches: reports,
      durationMs: this.now() - runStartedAt,
      interrupted,
    };
  }
}
