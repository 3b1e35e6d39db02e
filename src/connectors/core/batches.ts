import type { BatchRange } from "./types.js";

/**
 * Splits `[start, end)` into consecutive ranges of `batchSize` items.
 * The last range is truncated to end exactly at `end`.
 */
export function planBatches(
  start: number,
  end: number,
  batchSize: number,
): BatchRange[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
    throw new RangeError(`Invalid range [${start}, ${end})`);
  }

  const batches: BatchRange[] = [];
  for (let s = start; s < end; s += batchSize) {
    batches.push({ start: s, stop: Math.min(s + batchSize, end) });
  }
  return batches;
}

/** Running mean of batch durations and the time left for the rest. */
export class BatchTimer {
  private total = 0;
  private count = 0;

  record(durationMs: number): void {
    this.total += durationMs;
    this.count += 1;
  }

  get meanMs(): number {
    return this.count === 0 ? 0 : this.total / this.count;
  }

  estimateRemaining(batchesLeft: number): number {
    return Math.max(0, batchesLeft) * this.meanMs;
  }
}

/** Formats milliseconds as `H:MM:SS`, rounded to the nearest second. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}
