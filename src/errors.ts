// Error taxonomy for the proxy pipeline. Each request-level error carries the status it is rendered with.

export abstract class ProxyError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Inbound body could not be fully read (client abort, truncation, socket error)
export class BodyReadError extends ProxyError {
  readonly status = 400;
  readonly code = 'BODY_READ_FAILED';

  constructor(cause?: unknown) {
    super('Failed to receive request body', { cause });
  }
}

// JSON body exceeded MAX_JSON_BODY_BYTES while being buffered for inspection
export class BodyTooLargeError extends ProxyError {
  readonly status = 413;
  readonly code = 'BODY_TOO_LARGE';

  constructor(readonly limit: number, cause?: unknown) {
    super(`Request body exceeds the ${limit} byte limit for JSON inspection`, { cause });
  }
}

// Extracted token cannot be carried in an HTTP header value
export class InvalidTokenError extends ProxyError {
  readonly status = 400;
  readonly code = 'INVALID_AUTH_TOKEN';

  constructor(cause?: unknown) {
    super('Legacy auth token cannot be used as an Authorization header value', { cause });
  }
}

export class UpstreamError extends ProxyError {
  readonly status = 502;
  readonly code = 'UPSTREAM_UNAVAILABLE';

  constructor(reason: string, cause?: unknown) {
    super(`Upstream failed to respond: ${reason}`, { cause });
  }
}

// Startup only: never produced while serving a request
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
