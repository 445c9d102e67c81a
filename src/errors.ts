export type CrawlerErrorCode = 'TRANSPORT' | 'PARSE' | 'CONFIGURATION';

export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;

  constructor(code: CrawlerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrawlerError';
    this.code = code;
  }
}

/** Network failure, timeout or an unsuccessful status. Retried by the executor. */
export class TransportError extends CrawlerError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

/** The response could not be interpreted as markup. Never retried. */
export class ParseError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE', message, options);
    this.name = 'ParseError';
  }
}

/**
 * Bad pagination settings, unsupported output format, invalid regex or selector.
 * Always fatal and raised before any request is made.
 */
export class ConfigurationError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
