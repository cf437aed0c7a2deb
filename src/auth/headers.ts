// Ordered header list: keeps duplicates and arrival order, which IncomingHttpHeaders folds away

export type HeaderEntry = readonly [name: string, value: string];
export type HeaderList = readonly HeaderEntry[];

// Pair up a flat `rawHeaders` array ([name, value, name, value, ...])
export function fromRawHeaders(rawHeaders: readonly string[]): HeaderList {
  const entries: HeaderEntry[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    entries.push([rawHeaders[i], rawHeaders[i + 1]]);
  }
  return entries;
}

export function hasHeader(headers: HeaderList, name: string): boolean {
  const wanted = name.toLowerCase();
  return headers.some(([key]) => key.toLowerCase() === wanted);
}

// First value for a name, matched case-insensitively
export function getHeader(headers: HeaderList, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
}
