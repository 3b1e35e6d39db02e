import * as fs from "node:fs";
import * as path from "node:path";
import { CheckpointError } from "./errors.js";
import type { Checkpoint } from "./types.js";

/**
 * Single-integer cursor persisted as plain text (`"<n>\n"`).
 * A missing file reads as 0; malformed content is an error so a damaged
 * checkpoint never silently restarts a run and truncates its output.
 */
export class CheckpointStore implements Checkpoint {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<number> {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }
    const firstLine = raw.split(/\r?\n/, 1)[0]?.trim() ?? "";
    if (!/^\d+$/.test(firstLine)) {
      throw new CheckpointError(
        this.filePath,
        `Malformed checkpoint content ${JSON.stringify(firstLine)}`,
      );
    }
    return parseInt(firstLine, 10);
  }

  async save(value: number): Promise<void> {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new CheckpointError(
        this.filePath,
        `Cursor must be a non-negative integer, got ${value}`,
      );
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, `${value}\n`);
    fs.renameSync(tmp, this.filePath);
  }

  async reset(): Promise<void> {
    await this.save(0);
  }
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}
