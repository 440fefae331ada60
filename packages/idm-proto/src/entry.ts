import { z } from 'zod';
import type { WireValue } from './wire.js';

/**
 * A directory object: attribute name → ordered values.
 *
 * Attribute names are kept in ascending code-unit order; values keep the
 * order they were given in. Duplicate values are allowed here, whether they
 * survive is a schema/backend decision.
 */
export interface Entry {
  readonly attrs: ReadonlyMap<string, readonly string[]>;
}

export type EntryAttrs = Readonly<Record<string, readonly string[]>>;

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

type AttrMap = ReadonlyMap<string, readonly string[]>;

function isAttrMap(attrs: EntryAttrs | AttrMap): attrs is AttrMap {
  return attrs instanceof Map;
}

/** Builds an Entry from a plain record or a map; the input is copied. */
export function createEntry(attrs: EntryAttrs | AttrMap): Entry {
  const pairs = isAttrMap(attrs) ? [...attrs.entries()] : Object.entries(attrs);
  pairs.sort(([a], [b]) => compareStrings(a, b));
  return { attrs: new Map(pairs.map(([name, values]) => [name, [...values]] as const)) };
}

export function entryValues(entry: Entry, attr: string): readonly string[] {
  return entry.attrs.get(attr) ?? [];
}

export function entryFirstValue(entry: Entry, attr: string): string | null {
  return entryValues(entry, attr)[0] ?? null;
}

export function entryHasValue(entry: Entry, attr: string, value: string): boolean {
  return entryValues(entry, attr).includes(value);
}

/** Plain-object view, in attribute order. */
export function entryToRecord(entry: Entry): Record<string, string[]> {
  return Object.fromEntries([...entry.attrs].map(([name, values]) => [name, [...values]]));
}

export const EntrySchema = z
  .object({ attrs: z.record(z.string(), z.array(z.string())) })
  .strict()
  .transform(({ attrs }) => createEntry(attrs));

export function encodeEntry(entry: Entry): WireValue {
  return { attrs: entryToRecord(entry) };
}
