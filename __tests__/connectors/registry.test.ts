import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CollectorConfigSchema } from "../../src/connectors/core/index.js";
import type { Logger } from "../../src/connectors/core/index.js";
import { createEngine, SOURCES } from "../../src/connectors/registry.js";
import { steamSpySource } from "../../src/connectors/steamspy/index.js";

function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
    status: vi.fn(),
  };
}

function respond(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

describe("createEngine", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "steam-collector-registry-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("registers steam then steamspy", () => {
    const engine = createEngine(CollectorConfigSchema.parse({ dataDir: tmpDir }));
    expect(engine.listSources()).toEqual(["steam", "steamspy"]);
    expect(SOURCES.map((s) => s.name)).toEqual(["steam", "steamspy"]);
  });

  it("collects SteamSpy details over HTTP, retrying a throttled request", async () => {
    const fetchImpl = vi.fn(async (input: string | URL | Request): Promise<Response> => {
      const url = new URL(String(input));
      if (url.searchParams.get("request") === "all") {
        return respond({
          "20": { appid: 20, name: "Second" },
          "10": { appid: 10, name: "First" },
        });
      }
      const appid = Number(url.searchParams.get("appid"));
      return respond({ appid, name: appid === 10 ? "First" : "Second", owners: "0 .. 20,000", tags: [] });
    });
    // The first appdetails request is throttled with an empty body
    fetchImpl.mockResolvedValueOnce(
      respond({ "10": { appid: 10, name: "First" }, "20": { appid: 20, name: "Second" } }),
    );
    fetchImpl.mockResolvedValueOnce(new Response("", { status: 200 }));
    const sleep = vi.fn(async (_ms: number) => {});

    const engine = createEngine(CollectorConfigSchema.parse({ dataDir: tmpDir }), {
      sources: [steamSpySource],
      fetchImpl,
      sleep,
      createLogger: () => makeLogger(),
    });
    const result = await engine.collectOne("steamspy");

    expect(result.errors).toEqual([]);
    expect(result.itemsWritten).toBe(2);
    expect(fetchImpl).toHaveBeenCalledTimes(4);

    const lines = fs
      .readFileSync(path.join(tmpDir, "steamspy_data.csv"), "utf-8")
      .trimEnd()
      .split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^appid,name,developer,publisher,/);
    expect(lines[1]).toBe('10,First,,,,,,,"0 .. 20,000",,,,,,,,,,,[]');
    expect(lines[2]).toBe('20,Second,,,,,,,"0 .. 20,000",,,,,,,,,,,[]');
    expect(fs.readFileSync(path.join(tmpDir, "steamspy_index.txt"), "utf-8")).toBe("2\n");

    // 10s throttle wait, then the 300ms pause after each item
    const waits = sleep.mock.calls.map(([ms]) => ms);
    expect(waits.filter((ms) => ms === 1_000)).toHaveLength(10);
    expect(waits.filter((ms) => ms === 300)).toHaveLength(2);
  });
});
