/**
 * Collector configuration.
 *
 * Sources, in increasing precedence: built-in defaults, a YAML file,
 * environment variables (COLLECT_*), then CLI flags applied by the caller.
 */

import * as fs from "node:fs";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "collector.config.yaml";

const ItemErrorPolicySchema = z.enum(["abort", "skip"]);

const SourceSettingsSchema = z
  .object({
    batchSize: z.number().int().positive().optional(),
    pauseMs: z.number().min(0).optional(),
    end: z.number().int().min(0).optional(),
  })
  .strict();

const RetrySchema = z
  .object({
    maxAttempts: z.number().int().positive().optional(),
    transportDelayMs: z.number().int().min(0).default(5_000),
    emptyResponseDelayMs: z.number().int().min(0).default(10_000),
    backoffFactor: z.number().min(1).default(1),
    maxDelayMs: z.number().int().positive().default(300_000),
  })
  .strict();

export const CollectorConfigSchema = z
  .object({
    dataDir: z.string().min(1).default("./data/download"),
    userAgent: z.string().min(1).default("steam-collector/1.0"),
    requestTimeoutMs: z.number().int().positive().default(30_000),
    onItemError: ItemErrorPolicySchema.default("abort"),
    retry: RetrySchema.default({}),
    sources: z.record(SourceSettingsSchema).default({}),
  })
  .strict();

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist. Without it the default file is used if present. */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(opts: LoadConfigOptions = {}): CollectorConfig {
  const env = opts.env ?? process.env;
  const fileValues = readConfigFile(opts.file);
  const merged = applyEnv(fileValues, env);

  const result = CollectorConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map(
        (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
      ),
    );
  }
  return result.data;
}

function readConfigFile(file: string | undefined): Record<string, unknown> {
  const filePath = file ?? DEFAULT_CONFIG_FILE;
  if (!fs.existsSync(filePath)) {
    if (file) throw new ConfigError(`Config file not found: ${file}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yamlParse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping`);
  }
  return { ...parsed };
}

function applyEnv(
  values: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...values };

  if (env.COLLECT_DATA_DIR) out.dataDir = env.COLLECT_DATA_DIR;
  if (env.COLLECT_USER_AGENT) out.userAgent = env.COLLECT_USER_AGENT;
  if (env.COLLECT_REQUEST_TIMEOUT_MS) {
    out.requestTimeoutMs = toNumber(
      "COLLECT_REQUEST_TIMEOUT_MS",
      env.COLLECT_REQUEST_TIMEOUT_MS,
    );
  }
  if (env.COLLECT_ON_ITEM_ERROR) out.onItemError = env.COLLECT_ON_ITEM_ERROR;
  if (env.COLLECT_MAX_ATTEMPTS) {
    const retry = isRecord(out.retry) ? out.retry : {};
    out.retry = {
      ...retry,
      maxAttempts: toNumber("COLLECT_MAX_ATTEMPTS", env.COLLECT_MAX_ATTEMPTS),
    };
  }
  return out;
}

function toNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
