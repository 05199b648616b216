// Error kinds raised by the pipeline. Lookup misses are not errors: the
// resolver and splitter return null and callers skip the cell.

export class NetworkError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "NetworkError";
    this.url = url;
    this.status = options.status;
  }
}

export class ParseError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super(source ? `${message} (${source})` : message, options);
    this.name = "ParseError";
    this.source = source;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
