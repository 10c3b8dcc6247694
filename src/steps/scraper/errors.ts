export class ScrapeError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }
}

/**
 * Transport failure, timeout or non-2xx response while fetching a page.
 */
export class NetworkError extends ScrapeError {
  public readonly url: string;
  public readonly reason: string;
  public readonly status?: number;

  constructor(url: string, reason: string, options: { status?: number; cause?: unknown } = {}) {
    super(`Request to ${url} failed: ${reason}`, 'NETWORK_ERROR', { url, status: options.status }, options.cause);
    this.url = url;
    this.reason = reason;
    this.status = options.status;
  }
}

/**
 * The page markup no longer matches what the extractor expects.
 */
export class MarkupError extends ScrapeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MARKUP_ERROR', context);
  }
}

export class FilesystemError extends ScrapeError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'FILESYSTEM_ERROR', { path: filePath }, cause);
  }
}

export class DataError extends ScrapeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DATA_ERROR', context);
  }
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
