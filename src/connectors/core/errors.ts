/**
 * Error types shared by the collector core.
 *
 * Transient fetch failures stay inside the fetcher's retry loop; only
 * `exhausted` reaches callers, and only when a retry bound is configured.
 */

export type FetchErrorKind =
  | "transport"
  | "status"
  | "empty"
  | "decode"
  | "exhausted";

export interface FetchErrorDetails {
  status?: number;
  retryAfterMs?: number;
  attempts?: number;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status?: number;
  readonly retryAfterMs?: number;
  readonly attempts?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    details: FetchErrorDetails = {},
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
    this.attempts = details.attempts;
  }

  /** Empty bodies and error statuses usually mean the API is throttling us. */
  get isThrottle(): boolean {
    return this.kind === "status" || this.kind === "empty";
  }

  get isTransient(): boolean {
    return this.kind !== "exhausted";
  }
}

export class CheckpointError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${message} (${filePath})`);
    this.name = "CheckpointError";
    this.filePath = filePath;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
