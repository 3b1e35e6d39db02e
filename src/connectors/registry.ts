/**
 * Wires the configured sources into a collection engine.
 */

import type {
  CollectionEngineConfig,
  CollectorConfig,
  DataSource,
} from "./core/index.js";
import { CollectionEngine, createFetcher } from "./core/index.js";
import { steamSource } from "./steam/index.js";
import { steamSpyItemProvider, steamSpySource } from "./steamspy/index.js";

/** Collection order for `collect` without a source name. */
export const SOURCES: DataSource[] = [steamSource, steamSpySource];

export type EngineOverrides = Partial<
  Pick<CollectionEngineConfig, "createLogger" | "sleep">
> & {
  fetchImpl?: typeof fetch;
  sources?: DataSource[];
};

export function createEngine(
  config: CollectorConfig,
  overrides: EngineOverrides = {},
): CollectionEngine {
  return new CollectionEngine({
    dataDir: config.dataDir,
    sources: overrides.sources ?? SOURCES,
    itemProvider: steamSpyItemProvider,
    sourceSettings: config.sources,
    onItemError: config.onItemError,
    createLogger: overrides.createLogger,
    sleep: overrides.sleep,
    createFetcher: (logger) =>
      createFetcher({
        logger,
        retry: config.retry,
        requestTimeoutMs: config.requestTimeoutMs,
        userAgent: config.userAgent,
        fetchImpl: overrides.fetchImpl,
        sleep: overrides.sleep,
      }),
  });
}
