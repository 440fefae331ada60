import type { Filter, FilterKind } from './types.js';
import { compareStrings } from '../entry.js';

/** Variant rank: the first key of the total order. */
const KIND_RANK: Readonly<Record<FilterKind, number>> = {
  eq: 0,
  sub: 1,
  pres: 2,
  or: 3,
  and: 4,
  andNot: 5,
  self: 6,
};

function compareSequences(a: readonly Filter[], b: readonly Filter[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    const c = compareFilters(left, right);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

/**
 * Three-way comparison: variant rank, then attribute, then value, with
 * combinator children compared element by element. Returns <0, 0 or >0.
 */
export function compareFilters(a: Filter, b: Filter): number {
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0) return Math.sign(rank);

  // Equal rank means equal kind; the checks on b only narrow it.
  switch (a.kind) {
    case 'eq':
    case 'sub':
      if (b.kind === 'eq' || b.kind === 'sub') {
        return compareStrings(a.attr, b.attr) || compareStrings(a.value, b.value);
      }
      break;
    case 'pres':
      if (b.kind === 'pres') return compareStrings(a.attr, b.attr);
      break;
    case 'or':
    case 'and':
      if (b.kind === 'or' || b.kind === 'and') return Math.sign(compareSequences(a.filters, b.filters));
      break;
    case 'andNot':
      if (b.kind === 'andNot') return compareFilters(a.filter, b.filter);
      break;
    case 'self':
      break;
  }
  return 0;
}

/** Exact structural equality; child order inside and/or matters here. */
export function filtersEqual(a: Filter, b: Filter): boolean {
  return compareFilters(a, b) === 0;
}
