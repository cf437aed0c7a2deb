// Legacy auth detection: existing Authorization header > ?auth= query parameter > JSON body "auth" field
import type { Readable } from 'node:stream';
import getRawBody from 'raw-body';
import { BodyReadError, BodyTooLargeError } from '../errors';
import { err, ok, Result } from '../lib/result';
import { getHeader, hasHeader, HeaderList } from './headers';

export type TokenSource = 'query' | 'body';

export interface LegacyToken {
  value: string;
  source: TokenSource;
}

/**
 * What the forwarder should send as the request body.
 * `stream`: the inbound stream was never read and is piped through as is.
 * `buffered`: the inbound stream was consumed; `bytes` are the exact bytes received.
 */
export type ForwardBody = { kind: 'stream' } | { kind: 'buffered'; bytes: Buffer };

export interface Extraction {
  body: ForwardBody;
  token?: LegacyToken;
}

export interface InboundRequest {
  /** Request target as received: path plus optional query string. */
  url: string;
  headers: HeaderList;
  body: Readable;
  /** Upper bound for buffering a JSON body; unbounded when omitted. */
  maxBodyBytes?: number;
}

export type ExtractError = BodyReadError | BodyTooLargeError;

const STREAM: ForwardBody = { kind: 'stream' };
const utf8 = new TextDecoder('utf-8', { fatal: true });

export function extractAuthFromQuery(url: string): string | undefined {
  const start = url.indexOf('?');
  if (start === -1) {
    return undefined;
  }
  // Fragments never reach a server, but a stray '#' must not leak into the last value
  const end = url.indexOf('#', start);
  const query = url.slice(start + 1, end === -1 ? undefined : end);
  return new URLSearchParams(query).get('auth') ?? undefined;
}

export function isJsonContentType(headers: HeaderList): boolean {
  const contentType = getHeader(headers, 'content-type');
  return contentType !== undefined && contentType.toLowerCase().includes('application/json');
}

// Undecodable or unparseable bytes simply mean "no token"
export function extractAuthFromJson(bytes: Buffer): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  const auth = 'auth' in parsed ? parsed.auth : undefined;
  return typeof auth === 'string' ? auth : undefined;
}

function isEntityTooLarge(cause: unknown): boolean {
  return cause instanceof Error && 'type' in cause && cause.type === 'entity.too.large';
}

async function readBody(request: InboundRequest): Promise<Result<Buffer, ExtractError>> {
  const length = getHeader(request.headers, 'content-length');
  try {
    const bytes = await getRawBody(request.body, {
      length: length !== undefined && /^\d+$/.test(length) ? length : undefined,
      limit: request.maxBodyBytes,
    });
    return ok(bytes);
  } catch (cause) {
    if (request.maxBodyBytes !== undefined && isEntityTooLarge(cause)) {
      return err(new BodyTooLargeError(request.maxBodyBytes, cause));
    }
    return err(new BodyReadError(cause));
  }
}

/**
 * Finds the legacy token for a request. Only a JSON request without an Authorization header or
 * `auth` query parameter has its body read; the bytes are handed back unchanged for replay.
 */
export async function extractAuth(request: InboundRequest): Promise<Result<Extraction, ExtractError>> {
  if (hasHeader(request.headers, 'authorization')) {
    return ok({ body: STREAM });
  }

  const fromQuery = extractAuthFromQuery(request.url);
  if (fromQuery !== undefined) {
    return ok({ body: STREAM, token: { value: fromQuery, source: 'query' } });
  }

  if (!isJsonContentType(request.headers)) {
    return ok({ body: STREAM });
  }

  const read = await readBody(request);
  if (!read.ok) {
    return read;
  }

  const body: ForwardBody = { kind: 'buffered', bytes: read.value };
  const fromBody = extractAuthFromJson(read.value);
  return ok(fromBody === undefined ? { body } : { body, token: { value: fromBody, source: 'body' } });
}
