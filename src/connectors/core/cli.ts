#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import { createEngine } from "../registry.js";
import { loadConfig } from "./config.js";
import type { CollectorConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { CollectionResult, CollectOverrides, ItemErrorPolicy } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

interface CommonFlags {
  config?: string;
  dataDir?: string;
}

interface CollectFlags extends CommonFlags {
  start?: number;
  end?: number;
  batchSize?: number;
  pause?: number;
  maxAttempts?: number;
  onItemError?: ItemErrorPolicy;
  reset?: boolean;
  refreshItems?: boolean;
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

function positiveInt(value: string): number {
  const n = nonNegativeInt(value);
  if (n === 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function seconds(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return n;
}

function itemErrorPolicy(value: string): ItemErrorPolicy {
  if (value === "abort" || value === "skip") return value;
  throw new InvalidArgumentError('Expected "abort" or "skip".');
}

function resolveConfig(flags: CommonFlags & { maxAttempts?: number }): CollectorConfig {
  const config = loadConfig({ file: flags.config });
  return {
    ...config,
    dataDir: flags.dataDir ?? config.dataDir,
    retry: {
      ...config.retry,
      maxAttempts: flags.maxAttempts ?? config.retry.maxAttempts,
    },
  };
}

function printResults(results: CollectionResult[]): void {
  console.log("\n═══ Collection Summary ═══\n");
  for (const r of results) {
    const status = r.errors.length === 0 ? (r.interrupted ? "■" : "✓") : "⚠";
    const cursor = r.cursor === null ? "unknown" : `${r.cursor}/${r.total}`;
    console.log(
      `${status} ${r.source}: ${r.itemsWritten} written, ${r.itemsFailed} failed, cursor ${cursor} [${(r.durationMs / 1000).toFixed(1)}s]`,
    );
    for (const err of r.errors.slice(0, 5)) {
      console.log(`  ✗ ${err.entity}: ${err.error}`);
    }
    if (r.errors.length > 5) {
      console.log(`  ... and ${r.errors.length - 5} more errors`);
    }
  }
}

const program = new Command()
  .name("steam-collect")
  .description("Collect Steam Store and SteamSpy app data in resumable batches")
  .version("1.0.0");

program
  .command("collect")
  .description("Collect records for one source, or all sources in order")
  .argument("[source]", "Source to collect (default: all)")
  .option("--config <file>", "YAML config file")
  .option("--data-dir <dir>", "Directory for item list, output and checkpoints")
  .option("--start <index>", "Start index (default: saved checkpoint)", nonNegativeInt)
  .option("--end <index>", "Exclusive end index (default: end of item list)", nonNegativeInt)
  .option("--batch-size <n>", "Items per written batch", positiveInt)
  .option("--pause <seconds>", "Pause after every request", seconds)
  .option("--max-attempts <n>", "Attempts per request before giving up", positiveInt)
  .option("--on-item-error <policy>", "abort | skip", itemErrorPolicy)
  .option("--reset", "Reset the checkpoint and start a fresh output file")
  .option("--refresh-items", "Refetch the item list instead of using the cached one")
  .action(async (sourceName: string | undefined, flags: CollectFlags) => {
    const engine = createEngine(resolveConfig(flags));
    const overrides: CollectOverrides = {
      start: flags.start,
      end: flags.end,
      batchSize: flags.batchSize,
      pauseMs: flags.pause === undefined ? undefined : Math.round(flags.pause * 1000),
      onItemError: flags.onItemError,
      reset: flags.reset,
      refreshItems: flags.refreshItems,
    };

    const results = sourceName
      ? [await engine.collectOne(sourceName, overrides)]
      : await engine.collectAll(overrides);

    printResults(results);
    const hasErrors = results.some((r) => r.errors.length > 0);
    process.exit(hasErrors ? 1 : 0);
  });

program
  .command("status")
  .description("Show the checkpoint of every source")
  .option("--config <file>", "YAML config file")
  .option("--data-dir <dir>", "Directory for item list, output and checkpoints")
  .action(async (flags: CommonFlags) => {
    const engine = createEngine(resolveConfig(flags));
    for (const s of await engine.status()) {
      const total = s.total === null ? "?" : String(s.total);
      const file = s.dataFileExists ? "" : " (no data file)";
      console.log(`${s.source}: cursor ${s.cursor}/${total}${file}`);
    }
  });

program
  .command("reset")
  .description("Reset a source's checkpoint to 0")
  .argument("<source>", "Source to reset")
  .option("--config <file>", "YAML config file")
  .option("--data-dir <dir>", "Directory for item list, output and checkpoints")
  .action(async (sourceName: string, flags: CommonFlags) => {
    const engine = createEngine(resolveConfig(flags));
    await engine.reset(sourceName);
    console.log(`${sourceName}: checkpoint reset to 0`);
  });

program
  .command("sources")
  .description("List available sources")
  .action(() => {
    const engine = createEngine(loadConfig());
    console.log("Available sources:");
    for (const name of engine.listSources()) {
      console.log(`  - ${name}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
});
