/**
 * HTTP GET client with wait-and-retry semantics.
 *
 * Requests are retried until they succeed unless `maxAttempts` is set.
 * Transport failures and undecodable bodies wait `transportDelayMs`;
 * error statuses and empty bodies (how the Steam endpoints signal
 * throttling) wait `emptyResponseDelayMs`, or longer if the server sends
 * a Retry-After header. The wait is shown as a per-second countdown.
 */

import { FetchError, errorMessage } from "./errors.js";
import { sleep as defaultSleep, withRetry } from "./retry.js";
import type {
  Fetcher,
  FetchRetryPolicy,
  JsonValue,
  Logger,
  QueryParams,
} from "./types.js";

const DEFAULT_TRANSPORT_DELAY_MS = 5_000;
const DEFAULT_EMPTY_RESPONSE_DELAY_MS = 10_000;
const DEFAULT_MAX_DELAY_MS = 300_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_USER_AGENT = "steam-collector/1.0";
const COUNTDOWN_STEP_MS = 1_000;

export interface HttpFetcherOptions {
  logger: Logger;
  retry?: FetchRetryPolicy;
  requestTimeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export class HttpFetcher implements Fetcher {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly transportDelayMs: number;
  private readonly emptyResponseDelayMs: number;
  private readonly backoffFactor: number;
  private readonly maxDelayMs: number;

  constructor(opts: HttpFetcherOptions) {
    const retry = opts.retry ?? {};
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = opts.sleep ?? defaultSleep;
    this.timeoutMs = opts.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.maxAttempts = retry.maxAttempts ?? Infinity;
    this.transportDelayMs = retry.transportDelayMs ?? DEFAULT_TRANSPORT_DELAY_MS;
    this.emptyResponseDelayMs =
      retry.emptyResponseDelayMs ?? DEFAULT_EMPTY_RESPONSE_DELAY_MS;
    this.backoffFactor = retry.backoffFactor ?? 1;
    this.maxDelayMs = retry.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

    if (this.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be at least 1");
    }
  }

  async get(endpoint: string, query: QueryParams = {}): Promise<JsonValue> {
    // Invalid URLs throw here, outside the retry loop
    const url = buildUrl(endpoint, query);

    try {
      return await withRetry((attempt) => this.attempt(url, attempt), {
        maxRetries: this.maxAttempts - 1,
        backoffFactor: this.backoffFactor,
        maxDelayMs: this.maxDelayMs,
        jitter: 0,
        retryOn: (err) => err instanceof FetchError && err.isTransient,
        delayFor: (err) => this.baseDelayFor(err),
        wait: (ms, err) => this.countdown(ms, err),
      });
    } catch (err) {
      if (err instanceof FetchError && err.isTransient) {
        throw new FetchError(
          "exhausted",
          `Giving up on ${url.origin}${url.pathname} after ${this.maxAttempts} attempts: ${err.message}`,
          { attempts: this.maxAttempts, status: err.status, cause: err },
        );
      }
      throw err;
    }
  }

  private async attempt(url: URL, attempt: number): Promise<JsonValue> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Accept: "application/json",
          "User-Agent": this.userAgent,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new FetchError("transport", `Request failed: ${errorMessage(err)}`, {
        attempts: attempt,
        cause: err,
      });
    }

    if (!response.ok) {
      // Release the connection before waiting to retry
      await response.body?.cancel().catch((err: unknown) => {
        this.logger.warn(`Could not discard response body: ${errorMessage(err)}`);
      });
      throw new FetchError(
        "status",
        `No usable response (HTTP ${response.status})`,
        {
          status: response.status,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
          attempts: attempt,
        },
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new FetchError(
        "transport",
        `Failed reading response body: ${errorMessage(err)}`,
        { status: response.status, attempts: attempt, cause: err },
      );
    }

    if (text.trim() === "") {
      throw new FetchError("empty", "Empty response body", {
        status: response.status,
        attempts: attempt,
      });
    }

    let body: JsonValue;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new FetchError(
        "decode",
        `Malformed JSON in response: ${errorMessage(err)}`,
        { status: response.status, attempts: attempt, cause: err },
      );
    }

    if (body === null) {
      throw new FetchError("empty", "Response body was null", {
        status: response.status,
        attempts: attempt,
      });
    }
    return body;
  }

  private baseDelayFor(err: unknown): number {
    if (!(err instanceof FetchError) || !err.isThrottle) {
      return this.transportDelayMs;
    }
    return Math.max(this.emptyResponseDelayMs, err.retryAfterMs ?? 0);
  }

  private async countdown(ms: number, err: unknown): Promise<void> {
    const seconds = Math.ceil(ms / 1000);
    this.logger.warn(`${errorMessage(err)}, waiting ${seconds}s before retrying`);

    let remaining = ms;
    while (remaining > 0) {
      this.logger.status(`Waiting... (${Math.ceil(remaining / 1000)})`);
      const step = Math.min(COUNTDOWN_STEP_MS, remaining);
      await this.sleep(step);
      remaining -= step;
    }
    this.logger.status("Retrying.");
  }
}

export function buildUrl(endpoint: string, query: QueryParams = {}): URL {
  const url = new URL(endpoint);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url;
}

/** Parses a Retry-After header given in seconds or as an HTTP date. */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function createFetcher(opts: HttpFetcherOptions): Fetcher {
  return new HttpFetcher(opts);
}
