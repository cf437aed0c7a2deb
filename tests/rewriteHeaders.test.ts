import { fromRawHeaders, getHeader, hasHeader, HeaderList } from '../src/auth/headers';
import { rewriteHeaders, toWireValue } from '../src/auth/rewriteHeaders';
import { InvalidTokenError } from '../src/errors';

const ORIGINAL: HeaderList = [
  ['Host', 'proxy.local'],
  ['X-Trace', 'one'],
  ['Accept', 'application/json'],
  ['X-Trace', 'two'],
];

describe('header list', () => {
  it('pairs up raw headers in arrival order', () => {
    expect(fromRawHeaders(['Host', 'a', 'x-trace', '1', 'X-Trace', '2'])).toEqual([
      ['Host', 'a'],
      ['x-trace', '1'],
      ['X-Trace', '2'],
    ]);
  });

  it('looks names up case-insensitively', () => {
    expect(hasHeader(ORIGINAL, 'x-trace')).toBe(true);
    expect(hasHeader(ORIGINAL, 'authorization')).toBe(false);
    expect(getHeader(ORIGINAL, 'X-TRACE')).toBe('one');
    expect(getHeader(ORIGINAL, 'content-type')).toBeUndefined();
  });
});

describe('rewriteHeaders', () => {
  it('returns an equal copy when there is no token', () => {
    const result = rewriteHeaders(ORIGINAL);

    expect(result).toEqual({ ok: true, value: ORIGINAL });
    if (result.ok) {
      expect(result.value).not.toBe(ORIGINAL);
    }
  });

  it('appends the bearer header after every original entry', () => {
    const result = rewriteHeaders(ORIGINAL, 'abc123');

    expect(result).toEqual({ ok: true, value: [...ORIGINAL, ['Authorization', 'Bearer abc123']] });
    expect(ORIGINAL).toHaveLength(4);
  });

  it('appends rather than replaces an Authorization entry', () => {
    const result = rewriteHeaders([['authorization', 'Basic dGVzdA==']], 'abc123');

    expect(result).toEqual({
      ok: true,
      value: [
        ['authorization', 'Basic dGVzdA=='],
        ['Authorization', 'Bearer abc123'],
      ],
    });
  });

  it('uses the token as is, without encoding it', () => {
    const result = rewriteHeaders([], 'a b+c/=%20');

    expect(result).toEqual({ ok: true, value: [['Authorization', 'Bearer a b+c/=%20']] });
  });

  it('accepts an empty token', () => {
    expect(rewriteHeaders([], '')).toEqual({ ok: true, value: [['Authorization', 'Bearer ']] });
  });

  it('carries non-ASCII tokens as their UTF-8 bytes', () => {
    const result = rewriteHeaders([], 'tök€n');

    expect(result).toEqual({ ok: true, value: [['Authorization', 'Bearer t\u00c3\u00b6k\u00e2\u0082\u00acn']] });
    if (result.ok) {
      expect(Buffer.from(result.value[0][1], 'latin1')).toEqual(Buffer.from('Bearer tök€n', 'utf8'));
    }
  });

  it('allows a tab inside the token', () => {
    expect(rewriteHeaders([], 'a\tb')).toEqual({ ok: true, value: [['Authorization', 'Bearer a\tb']] });
  });

  it.each([
    ['a line break', 'abc\r\nX-Injected: 1'],
    ['a NUL byte', 'abc\u0000def'],
    ['a DEL byte', 'abc\u007fdef'],
  ])('rejects a token containing %s', (_label, token) => {
    const result = rewriteHeaders(ORIGINAL, token);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidTokenError);
      expect(result.error.status).toBe(400);
    }
  });
});

describe('toWireValue', () => {
  it('leaves ASCII values unchanged', () => {
    expect(toWireValue('Bearer abc123')).toBe('Bearer abc123');
  });

  it('returns undefined for control characters', () => {
    expect(toWireValue('Bearer a\nb')).toBeUndefined();
  });
});
