/**
 * Failures the matcher surfaces to its callers. A listing that matches nothing,
 * or matches several units, is a result and never one of these.
 */
export class ScrapeFailure extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "ScrapeFailure";
    this.url = url;
    this.status = opts.status;
  }
}

export class InvalidListingUrl extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid listing URL: ${reason}`);
    this.name = "InvalidListingUrl";
    this.url = url;
  }
}

export class DatasetUnavailable extends Error {
  constructor(message = "No registration snapshot is loaded", opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "DatasetUnavailable";
  }
}

export class SnapshotIntegrityError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(what: "rows" | "columns", expected: number, actual: number) {
    super(`Snapshot ${what} mismatch: expected ${expected}, found ${actual}`);
    this.name = "SnapshotIntegrityError";
    this.expected = expected;
    this.actual = actual;
  }
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof InvalidListingUrl) return 400;
  if (err instanceof ScrapeFailure) return 502;
  if (err instanceof DatasetUnavailable) return 503;
  return 500;
}
