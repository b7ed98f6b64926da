export class ApiError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(opts: { status: number; message: string; url: string }) {
    super(`API Error ${opts.status}: ${opts.message}`);
    this.name = 'ApiError';
    this.status = opts.status;
    this.url = opts.url;
  }
}

/** A data source could not supply a value for one symbol or call. */
export class DataUnavailableError extends Error {
  readonly source: string;
  readonly symbol?: string;

  constructor(opts: { source: string; message: string; symbol?: string; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'DataUnavailableError';
    this.source = opts.source;
    this.symbol = opts.symbol;
  }
}

/** Market-wide context could not be built; the whole run stops. */
export class CriticalContextError extends Error {
  readonly stage: string;

  constructor(stage: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CriticalContextError';
    this.stage = stage;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
