import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { Item } from "./types.js";

const ItemListSchema = z.array(
  z.object({
    id: z.union([z.number(), z.string()]),
    name: z.string(),
  }),
);

/**
 * Item list kept on disk so every run walks the same order. The cursor is
 * an index into this list, so it must not change under a resumed run.
 */
export class ItemListCache {
  readonly filePath: string;
  private readonly provider: () => Promise<Item[]>;

  constructor(filePath: string, provider: () => Promise<Item[]>) {
    this.filePath = filePath;
    this.provider = provider;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  async load(opts: { refresh?: boolean } = {}): Promise<Item[]> {
    if (!opts.refresh && this.exists()) {
      return this.readFromDisk();
    }
    const items = await this.provider();
    this.writeToDisk(items);
    return items;
  }

  readFromDisk(): Item[] {
    const raw = fs.readFileSync(this.filePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Item list ${this.filePath} is not valid JSON`, [
        err instanceof Error ? err.message : String(err),
      ]);
    }
    const result = ItemListSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigError(
        `Item list ${this.filePath} is malformed`,
        result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    return result.data;
  }

  private writeToDisk(items: Item[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(items, null, 2));
    fs.renameSync(tmp, this.filePath);
  }
}
