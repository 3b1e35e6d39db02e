import { describe, expect, it, vi } from "vitest";
import { FetchError } from "../../../src/connectors/core/errors.js";
import {
  buildUrl,
  HttpFetcher,
  parseRetryAfter,
} from "../../../src/connectors/core/fetcher.js";
import type { Logger } from "../../../src/connectors/core/types.js";

function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
    status: vi.fn(),
  };
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

function setup(...responses: Array<Response | Error>) {
  const fetchImpl = vi.fn<typeof fetch>();
  for (const r of responses) {
    if (r instanceof Error) fetchImpl.mockRejectedValueOnce(r);
    else fetchImpl.mockResolvedValueOnce(r);
  }
  const sleep = vi.fn(async (_ms: number) => {});
  const logger = makeLogger();
  return { fetchImpl, sleep, logger };
}

function totalSlept(sleep: { mock: { calls: [number][] } }): number {
  return sleep.mock.calls.reduce((sum, [ms]) => sum + ms, 0);
}

describe("HttpFetcher", () => {
  it("returns decoded JSON on success", async () => {
    const { fetchImpl, sleep, logger } = setup(jsonResponse({ ok: 1 }));
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/data")).resolves.toEqual({ ok: 1 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sends query parameters and JSON headers", async () => {
    const { fetchImpl, sleep, logger } = setup(jsonResponse({}));
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep, userAgent: "test-agent" });

    await fetcher.get("https://api.example.test/api.php", {
      request: "appdetails",
      appid: 570,
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(String(url)).toBe(
      "https://api.example.test/api.php?request=appdetails&appid=570",
    );
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "User-Agent": "test-agent",
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("waits 5s with a countdown after a transport failure, then retries", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new TypeError("fetch failed"),
      jsonResponse({ ok: true }),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/")).resolves.toEqual({ ok: true });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000, 1000, 1000, 1000]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Request failed: fetch failed, waiting 5s before retrying",
    );
    expect(logger.status).toHaveBeenCalledWith("Waiting... (5)");
    expect(logger.status).toHaveBeenCalledWith("Waiting... (1)");
    expect(logger.status).toHaveBeenLastCalledWith("Retrying.");
  });

  it("waits 10s after an error status", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new Response("", { status: 429 }),
      jsonResponse([1, 2]),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/")).resolves.toEqual([1, 2]);
    expect(totalSlept(sleep)).toBe(10_000);
  });

  it("discards the body of an error response before retrying", async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({ cancel });
    const { fetchImpl, sleep, logger } = setup(
      new Response(body, { status: 429 }),
      jsonResponse({ ok: true }),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/")).resolves.toEqual({ ok: true });
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalledWith(
      expect.stringContaining("Could not discard response body"),
    );
  });

  it("treats empty and null bodies as throttling", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new Response("", { status: 200 }),
      new Response("null", { status: 200 }),
      jsonResponse({ ok: true }),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/")).resolves.toEqual({ ok: true });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(totalSlept(sleep)).toBe(20_000);
  });

  it("retries malformed JSON with the transport delay", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new Response("<html>busy</html>", { status: 200 }),
      jsonResponse({ ok: true }),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("https://api.example.test/")).resolves.toEqual({ ok: true });
    expect(totalSlept(sleep)).toBe(5_000);
  });

  it("honours a Retry-After longer than the throttle delay", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new Response("", { status: 503, headers: { "Retry-After": "30" } }),
      jsonResponse({ ok: true }),
    );
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await fetcher.get("https://api.example.test/");
    expect(totalSlept(sleep)).toBe(30_000);
    expect(sleep).toHaveBeenCalledTimes(30);
  });

  it("keeps retrying without a bound by default", async () => {
    const failures = Array.from({ length: 12 }, () => new Response("", { status: 500 }));
    const { fetchImpl, sleep, logger } = setup(...failures, jsonResponse("finally"));
    const fetcher = new HttpFetcher({
      logger,
      fetchImpl,
      sleep,
      retry: { emptyResponseDelayMs: 1_000 },
    });

    await expect(fetcher.get("https://api.example.test/")).resolves.toBe("finally");
    expect(fetchImpl).toHaveBeenCalledTimes(13);
    expect(sleep).toHaveBeenCalledTimes(12);
  });

  it("gives up with an exhausted FetchError once maxAttempts is reached", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new Response("", { status: 502 }),
      new Response("", { status: 502 }),
      new Response("", { status: 502 }),
    );
    const fetcher = new HttpFetcher({
      logger,
      fetchImpl,
      sleep,
      retry: { maxAttempts: 3, emptyResponseDelayMs: 2_000 },
    });

    const err = await fetcher.get("https://api.example.test/x?y=1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    const fetchErr = err instanceof FetchError ? err : undefined;
    expect(fetchErr?.kind).toBe("exhausted");
    expect(fetchErr?.status).toBe(502);
    expect(fetchErr?.attempts).toBe(3);
    expect(fetchErr?.message).toBe(
      "Giving up on https://api.example.test/x after 3 attempts: No usable response (HTTP 502)",
    );
    expect(fetchErr?.cause).toBeInstanceOf(FetchError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(totalSlept(sleep)).toBe(4_000);
  });

  it("backs off exponentially when configured", async () => {
    const { fetchImpl, sleep, logger } = setup(
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
      jsonResponse({}),
    );
    const fetcher = new HttpFetcher({
      logger,
      fetchImpl,
      sleep,
      retry: { transportDelayMs: 1_000, backoffFactor: 2, maxDelayMs: 3_000 },
    });

    await fetcher.get("https://api.example.test/");
    // 1s, 2s, then 4s capped at 3s
    expect(totalSlept(sleep)).toBe(6_000);
  });

  it("fails immediately on an invalid URL", async () => {
    const { fetchImpl, sleep, logger } = setup();
    const fetcher = new HttpFetcher({ logger, fetchImpl, sleep });

    await expect(fetcher.get("not a url")).rejects.toThrow(TypeError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rejects maxAttempts below 1", () => {
    expect(
      () => new HttpFetcher({ logger: makeLogger(), retry: { maxAttempts: 0 } }),
    ).toThrow("maxAttempts must be at least 1");
  });
});

describe("buildUrl", () => {
  it("merges query parameters into existing ones", () => {
    const url = buildUrl("https://store.example.test/api/appdetails/?l=english", {
      appids: 10,
      cc: "us",
    });
    expect(url.toString()).toBe(
      "https://store.example.test/api/appdetails/?l=english&appids=10&cc=us",
    );
  });
});

describe("parseRetryAfter", () => {
  it("parses seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
  });

  it("parses HTTP dates relative to now", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:30 GMT", now)).toBe(30_000);
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:27:00 GMT", now)).toBe(0);
  });

  it("ignores missing or unparseable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});
