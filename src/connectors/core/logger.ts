import type { Logger } from "./types.js";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private statusOpen = false;

  constructor(sourceName: string) {
    this.prefix = `[${sourceName}]`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.endStatus();
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.log(`${this.prefix} ${msg}${extra}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.endStatus();
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.warn(`${this.prefix} ⚠ ${msg}${extra}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.endStatus();
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ✗ ${msg}${extra}`);
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    this.status(`${label}: ${current}/${total} (${pct}%)`);
    if (current >= total) this.endStatus();
  }

  status(msg: string): void {
    // Pad so a shorter message fully covers the previous one
    process.stdout.write(`\r${this.prefix} ${msg.padEnd(40)}`);
    this.statusOpen = true;
  }

  private endStatus(): void {
    if (!this.statusOpen) return;
    process.stdout.write("\n");
    this.statusOpen = false;
  }
}

export function createLogger(sourceName: string): Logger {
  return new ConsoleLogger(sourceName);
}
