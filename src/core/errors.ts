export interface TransportErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

/**
 * Network or HTTP failure for a single URL. Always isolated to the URL that
 * produced it: callers decide whether it is fatal.
 */
export class TransportError extends Error {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, options: TransportErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.url = url;
    this.statusCode = options.statusCode;
  }
}

export class MalformedUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`URL has no scheme or host: ${url}`);
    this.name = "MalformedUrlError";
    this.url = url;
  }
}

/** Failure that escapes per-site isolation and ends the whole run. */
export class RunLevelError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "RunLevelError";
  }
}

export class CrawlAbortedError extends Error {
  constructor(message = "crawl aborted") {
    super(message);
    this.name = "CrawlAbortedError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
