import * as fs from "node:fs";
import * as path from "node:path";
import { BatchProcessor } from "./batch-processor.js";
import { CheckpointStore } from "./checkpoint.js";
import { errorMessage } from "./errors.js";
import { ItemListCache } from "./items.js";
import { createLogger } from "./logger.js";
import { CsvSink } from "./sink.js";
import type {
  CollectionEngineConfig,
  CollectionResult,
  CollectOverrides,
  CollectionError,
  DataSource,
  Item,
  ItemError,
  Logger,
  SourceStatus,
} from "./types.js";

export const DEFAULT_ITEM_LIST_FILE = "items.json";

export class CollectionEngine {
  private readonly config: CollectionEngineConfig;
  private readonly makeLogger: (name: string) => Logger;

  constructor(config: CollectionEngineConfig) {
    this.config = config;
    this.makeLogger = config.createLogger ?? createLogger;
  }

  async collectAll(overrides: CollectOverrides = {}): Promise<CollectionResult[]> {
    const results: CollectionResult[] = [];
    for (const source of this.config.sources) {
      const result = await this.runSource(source, overrides);
      results.push(result);
      if (result.interrupted) break;
    }
    return results;
  }

  async collectOne(
    sourceName: string,
    overrides: CollectOverrides = {},
  ): Promise<CollectionResult> {
    return this.runSource(this.findSource(sourceName), overrides);
  }

  async status(): Promise<SourceStatus[]> {
    const cache = this.itemCache();
    const total = cache.exists() ? cache.readFromDisk().length : null;

    const statuses: SourceStatus[] = [];
    for (const source of this.config.sources) {
      const cursor = await this.checkpointFor(source).load();
      statuses.push({
        source: source.name,
        cursor,
        total,
        dataFileExists: fs.existsSync(this.dataPath(source.dataFile)),
      });
    }
    return statuses;
  }

  async reset(sourceName: string): Promise<void> {
    await this.checkpointFor(this.findSource(sourceName)).reset();
  }

  listSources(): string[] {
    return this.config.sources.map((s) => s.name);
  }

  private findSource(name: string): DataSource {
    const source = this.config.sources.find((s) => s.name === name);
    if (!source) {
      throw new Error(
        `Source "${name}" not found. Available: ${this.listSources().join(", ")}`,
      );
    }
    return source;
  }

  private async runSource(
    source: DataSource,
    overrides: CollectOverrides,
  ): Promise<CollectionResult> {
    const logger = this.makeLogger(source.name);
    const settings = this.config.sourceSettings?.[source.name] ?? {};
    const checkpoint = this.checkpointFor(source);
    const sink = new CsvSink(this.dataPath(source.dataFile), source.columns);

    const ac = new AbortController();

    // First SIGINT finishes the current batch; a second one uses Node's default
    const sigHandler = () => {
      logger.warn("Received interrupt, finishing current batch...");
      ac.abort();
      process.removeListener("SIGINT", sigHandler);
    };
    process.on("SIGINT", sigHandler);

    const startTime = Date.now();
    let total = 0;
    // Batches already on disk, kept for the result if the run fails later
    let itemsWritten = 0;
    const itemErrors: ItemError[] = [];
    try {
      const fetcher = this.config.createFetcher(logger);
      const items = await this.loadItems(logger, overrides);
      total = items.length;

      if (overrides.reset) {
        await checkpoint.reset();
        logger.info("Checkpoint reset to 0");
      }

      const processor = new BatchProcessor({ logger, sleep: this.config.sleep });
      const run = await processor.run({
        items,
        parser: source.createParser(fetcher),
        sink,
        checkpoint,
        start: overrides.start,
        end: overrides.end ?? settings.end,
        batchSize:
          overrides.batchSize ?? settings.batchSize ?? source.defaults.batchSize,
        pauseMs: overrides.pauseMs ?? settings.pauseMs ?? source.defaults.pauseMs,
        onItemError: overrides.onItemError ?? this.config.onItemError,
        signal: ac.signal,
        onBatch: (report) => {
          itemsWritten += report.recordsWritten;
          itemErrors.push(...report.errors);
        },
      });

      return {
        source: source.name,
        itemsWritten: run.itemsWritten,
        itemsFailed: run.itemsFailed,
        cursor: run.cursor,
        total,
        interrupted: run.interrupted,
        errors: run.errors.map(toCollectionError),
        durationMs: Date.now() - startTime,
      };
    } catch (err) {
      const errorMsg = errorMessage(err);
      logger.error(`Collection failed: ${errorMsg}`);
      return {
        source: source.name,
        itemsWritten,
        itemsFailed: itemErrors.length,
        cursor: await this.readCursor(checkpoint, logger),
        total,
        interrupted: ac.signal.aborted,
        errors: [
          ...itemErrors.map(toCollectionError),
          { entity: "run", error: errorMsg },
        ],
        durationMs: Date.now() - startTime,
      };
    } finally {
      process.removeListener("SIGINT", sigHandler);
    }
  }

  private async loadItems(
    logger: Logger,
    overrides: CollectOverrides,
  ): Promise<Item[]> {
    const refresh = overrides.refreshItems ?? false;
    const cache = this.itemCache();
    const previous = refresh && cache.exists() ? cache.readFromDisk() : null;
    if (refresh || !cache.exists()) {
      logger.info("Fetching item list...");
    }
    const items = await cache.load({ refresh });
    logger.info(`Item list has ${items.length} items`, { file: cache.filePath });

    if (previous && !overrides.reset && !sameItems(previous, items)) {
      await this.warnStaleCursors(logger, previous.length, items.length);
    }
    return items;
  }

  /** Saved cursors index the old list; resumed runs may skip or repeat items. */
  private async warnStaleCursors(
    logger: Logger,
    before: number,
    after: number,
  ): Promise<void> {
    const stale: string[] = [];
    for (const source of this.config.sources) {
      const cursor = await this.checkpointFor(source).load();
      if (cursor > 0) stale.push(`${source.name}@${cursor}`);
    }
    if (stale.length === 0) return;
    logger.warn(
      `Item list changed (${before} -> ${after} items) but cursors still point into the old list: ${stale.join(", ")}. Use --reset to start over`,
    );
  }

  private itemCache(): ItemListCache {
    const provider = this.config.itemProvider;
    const fetcher = () =>
      provider.fetchItems(this.config.createFetcher(this.makeLogger("items")));
    return new ItemListCache(
      this.dataPath(this.config.itemListFile ?? DEFAULT_ITEM_LIST_FILE),
      fetcher,
    );
  }

  private checkpointFor(source: DataSource): CheckpointStore {
    return new CheckpointStore(this.dataPath(source.checkpointFile));
  }

  private dataPath(fileName: string): string {
    return path.join(this.config.dataDir, fileName);
  }

  private async readCursor(
    checkpoint: CheckpointStore,
    logger: Logger,
  ): Promise<number | null> {
    try {
      return await checkpoint.load();
    } catch (err) {
      logger.warn(`Could not read checkpoint: ${errorMessage(err)}`);
      return null;
    }
  }
}

function toCollectionError(e: ItemError): CollectionError {
  return { entity: `item ${e.index} (${e.id})`, error: e.error };
}

function sameItems(a: readonly Item[], b: readonly Item[]): boolean {
  return (
    a.length === b.length &&
    a.every((item, i) => item.id === b[i].id && item.name === b[i].name)
  );
}
