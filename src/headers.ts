/**
 * Header list helpers
 *
 * Headers are kept as an ordered list of [name, value] pairs: names compare
 * case-insensitively and duplicates are allowed. Every helper returns a new
 * list; inputs are never mutated.
 */

export type HeaderEntry = readonly [name: string, value: string];

export type HeaderEntries = readonly HeaderEntry[];

/** What callers may pass: a plain record or an ordered pair list */
export type HeaderInput = Readonly<Record<string, string>> | HeaderEntries;

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function isEntryList(input: HeaderInput): input is HeaderEntries {
  return Array.isArray(input);
}

export function toHeaderEntries(input: HeaderInput | undefined): HeaderEntries {
  if (!input) {
    return [];
  }
  if (isEntryList(input)) {
    return input.map(([name, value]) => [name, value] as const);
  }
  return Object.entries(input).map(([name, value]) => [name, value] as const);
}

/**
 * First value for a header, or null
 */
export function getHeader(headers: HeaderEntries, name: string): string | null {
  const entry = headers.find(([key]) => sameName(key, name));
  return entry ? entry[1] : null;
}

/**
 * All values for a header, in order
 */
export function getAllHeaders(headers: HeaderEntries, name: string): string[] {
  return headers.filter(([key]) => sameName(key, name)).map(([, value]) => value);
}

/**
 * Replace every value of a header with a single one (appended last)
 */
export function setHeader(headers: HeaderEntries, name: string, value: string): HeaderEntries {
  return [...headers.filter(([key]) => !sameName(key, name)), [name, value]];
}

/**
 * Append a value, keeping existing ones
 */
export function addHeader(headers: HeaderEntries, name: string, value: string): HeaderEntries {
  return [...headers, [name, value]];
}

/**
 * Flatten to [name, value, name, value, ...] (the raw form HTTP engines take)
 */
export function flattenHeaders(headers: HeaderEntries): string[] {
  return headers.flatMap(([name, value]) => [name, value]);
}
