export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class FetchError extends Error {
  readonly url: string;

  constructor(url: string, cause: string) {
    super(`Failed to fetch ${url}: ${cause}`, { cause });
    this.name = "FetchError";
    this.url = url;
  }
}

export class NoViewportDataError extends Error {
  constructor(reason: string) {
    super(`No viewport data: ${reason}`);
    this.name = "NoViewportDataError";
  }
}

export class AuditUnavailableError extends Error {
  constructor(reason: string) {
    super(`Analyzer unavailable: ${reason}`);
    this.name = "AuditUnavailableError";
  }
}

export class AuditTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Analyzer timed out after ${timeoutMs}ms for ${url}`);
    this.name = "AuditTimeoutError";
  }
}

export class AuditOutputError extends Error {
  constructor(reason: string) {
    super(`Malformed analyzer output: ${reason}`);
    this.name = "AuditOutputError";
  }
}

export class RunCancelledError extends Error {
  constructor() {
    super("Run cancelled");
    this.name = "RunCancelledError";
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  auditsFailed: 2,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof RunCancelledError) return EXIT_CODES.cancelled;
  if (error instanceof AuditUnavailableError) return EXIT_CODES.auditsFailed;
  return EXIT_CODES.failed;
}
