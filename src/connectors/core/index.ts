// Batch processing
export {
  BatchProcessor,
  DEFAULT_BATCH_SIZE,
  DEFAULT_PAUSE_MS,
} from "./batch-processor.js";
export type { BatchProcessorDeps, BatchRunOptions } from "./batch-processor.js";
export { BatchTimer, formatDuration, planBatches } from "./batches.js";
// Durable state
export { CheckpointStore } from "./checkpoint.js";
export { createSink, CsvSink, formatCell, readField } from "./sink.js";
export type { CsvSinkOptions } from "./sink.js";
export { ItemListCache } from "./items.js";
// Configuration
export {
  CollectorConfigSchema,
  DEFAULT_CONFIG_FILE,
  loadConfig,
} from "./config.js";
export type { CollectorConfig, LoadConfigOptions } from "./config.js";
// Collection engine
export { CollectionEngine, DEFAULT_ITEM_LIST_FILE } from "./engine.js";
// Errors
export {
  CheckpointError,
  ConfigError,
  errorMessage,
  FetchError,
} from "./errors.js";
export type { FetchErrorDetails, FetchErrorKind } from "./errors.js";
// HTTP
export {
  buildUrl,
  createFetcher,
  HttpFetcher,
  parseRetryAfter,
} from "./fetcher.js";
export type { HttpFetcherOptions } from "./fetcher.js";
export { isJsonObject, toAppId } from "./json.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Retry helper
export { retryDelay, sleep, withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
// Types
export type {
  BatchRange,
  BatchReport,
  BatchRunResult,
  Checkpoint,
  CollectionEngineConfig,
  CollectionError,
  CollectionResult,
  CollectOverrides,
  DataSource,
  Fetcher,
  FetchRetryPolicy,
  Item,
  ItemError,
  ItemErrorPolicy,
  ItemId,
  ItemProvider,
  ItemRecord,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  Logger,
  QueryParams,
  RecordParser,
  Sink,
  SourceSettings,
  SourceStatus,
} from "./types.js";
