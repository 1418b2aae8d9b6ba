// ============================================================
// forkfleet — Hosting Errors
// ============================================================

export class HostingError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = "HostingError";
  }
}

// Network failures, 429 and 5xx. Safe to retry.
export class TransientHostingError extends HostingError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = "TransientHostingError";
  }
}

// Auth, permission and other client errors.
export class PermanentHostingError extends HostingError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = "PermanentHostingError";
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
