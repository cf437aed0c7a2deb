// Builds the outgoing header list: the original entries plus an appended bearer Authorization header
import { InvalidTokenError } from '../errors';
import { err, ok, Result } from '../lib/result';
import { HeaderEntry, HeaderList } from './headers';

export const AUTHORIZATION = 'Authorization';

export function toBearer(token: string): string {
  return `Bearer ${token}`;
}

// Header bytes may be anything but control characters (tab excepted) and DEL
function isHeaderValueByte(byte: number): boolean {
  return byte === 0x09 || (byte >= 0x20 && byte !== 0x7f);
}

/**
 * Header strings are written to the wire as latin1, one byte per char. Returns the string whose
 * latin1 bytes are the UTF-8 bytes of `value`, or undefined when those bytes cannot be a header value.
 */
export function toWireValue(value: string): string | undefined {
  const bytes = Buffer.from(value, 'utf8');
  return bytes.every(isHeaderValueByte) ? bytes.toString('latin1') : undefined;
}

/**
 * Returns a copy of `headers` with `Authorization: Bearer <token>` appended when a token is given.
 * Existing entries keep their order, case and duplicates; the caller's list is never touched.
 */
export function rewriteHeaders(headers: HeaderList, token?: string): Result<HeaderList, InvalidTokenError> {
  const outgoing: HeaderEntry[] = [...headers];
  if (token === undefined) {
    return ok(outgoing);
  }

  const value = toWireValue(toBearer(token));
  if (value === undefined) {
    return err(new InvalidTokenError());
  }

  outgoing.push([AUTHORIZATION, value]);
  return ok(outgoing);
}
