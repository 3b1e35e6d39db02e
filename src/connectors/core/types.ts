/** Core type definitions for steam-collector. */

// ─── JSON ───

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type QueryParams = Record<string, string | number | boolean>;

// ─── Items & Records ───

export type ItemId = number | string;

export interface Item {
  readonly id: ItemId;
  readonly name: string;
}

/** One flat record per item. Field order is insertion order. */
export type ItemRecord = {
  readonly [field: string]: JsonValue | undefined;
};

/** Turns one item into a record, or a placeholder when the API has no data for it. */
export type RecordParser = (id: ItemId, name: string) => Promise<ItemRecord>;

// ─── Data Source (strategy registered with the engine) ───

export interface DataSource {
  name: string;
  columns: readonly string[];
  dataFile: string;
  checkpointFile: string;
  defaults: {
    batchSize: number;
    pauseMs: number;
  };
  createParser(fetcher: Fetcher): RecordParser;
}

export interface ItemProvider {
  fetchItems(fetcher: Fetcher): Promise<Item[]>;
}

// ─── Fetcher ───

export interface Fetcher {
  get(endpoint: string, query?: QueryParams): Promise<JsonValue>;
}

export interface FetchRetryPolicy {
  /** Total attempts per request; undefined retries forever. */
  maxAttempts?: number;
  transportDelayMs?: number;
  emptyResponseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
}

// ─── Durable State ───

export interface Checkpoint {
  load(): Promise<number>;
  save(value: number): Promise<void>;
  reset(): Promise<void>;
}

export interface Sink {
  readonly columns: readonly string[];
  /** Writes the header when the cursor is at 0. Returns whether it wrote. */
  initialize(cursor: number): Promise<boolean>;
  append(batch: readonly ItemRecord[]): Promise<void>;
}

// ─── Batch Processing ───

export type ItemErrorPolicy = "abort" | "skip";

export interface BatchRange {
  start: number;
  stop: number;
}

export interface BatchReport extends BatchRange {
  index: number;
  recordsWritten: number;
  /** Items skipped in this batch. */
  errors: ItemError[];
  durationMs: number;
  meanMs: number;
  remainingMs: number;
}

export interface ItemError {
  index: number;
  id: ItemId;
  error: string;
}

export interface BatchRunResult {
  start: number;
  end: number;
  cursor: number;
  itemsWritten: number;
  itemsFailed: number;
  errors: ItemError[];
  batches: BatchReport[];
  durationMs: number;
  interrupted: boolean;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
  /** Rewrites the current terminal line (countdowns, current index). */
  status(msg: string): void;
}

// ─── Engine ───

export interface CollectOverrides {
  start?: number;
  end?: number;
  batchSize?: number;
  pauseMs?: number;
  reset?: boolean;
  refreshItems?: boolean;
  onItemError?: ItemErrorPolicy;
}

export interface SourceSettings {
  batchSize?: number;
  pauseMs?: number;
  end?: number;
}

export interface CollectionEngineConfig {
  dataDir: string;
  sources: DataSource[];
  itemProvider: ItemProvider;
  itemListFile?: string;
  sourceSettings?: Record<string, SourceSettings>;
  onItemError?: ItemErrorPolicy;
  createFetcher: (logger: Logger) => Fetcher;
  createLogger?: (name: string) => Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface CollectionError {
  entity: string;
  error: string;
}

export interface CollectionResult {
  source: string;
  itemsWritten: number;
  itemsFailed: number;
  /** Null when the checkpoint could not be read after a failure. */
  cursor: number | null;
  total: number;
  interrupted: boolean;
  errors: CollectionError[];
  durationMs: number;
}

export interface SourceStatus {
  source: string;
  cursor: number;
  total: number | null;
  dataFileExists: boolean;
}
