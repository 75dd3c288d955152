// src/errors.ts

/** Unrecoverable setup problem: raised before any scraping starts. */
export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(missing.length ? `${message}: ${missing.join(', ')}` : message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

export class AdapterError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`[${source}] ${message}`, options);
    this.name = 'AdapterError';
    this.source = source;
  }
}

export class SinkError extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, options?: { cause?: unknown }) {
    super(`[${sink}] ${message}`, options);
    this.name = 'SinkError';
    this.sink = sink;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
