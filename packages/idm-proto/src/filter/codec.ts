import { z } from 'zod';
import type { Filter, FilterLimits } from './types.js';
import { DEFAULT_FILTER_DEPTH_LIMIT } from './types.js';
import { filter } from './filter-object.js';
import { filterDepth } from './canonical.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { err, ok } from '../result.js';
import type { WireValue } from '../wire.js';
import { decodeWith, jsonDepth } from '../wire.js';

const pair = z.tuple([z.string(), z.string()]);

/**
 * Wire form of a filter. `self` travels as the bare string "Self", the tag
 * existing consumers already send.
 */
export const FilterSchema: z.ZodType<Filter, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ Eq: pair }).strict().transform(({ Eq: [attr, value] }): Filter => filter.eq(attr, value)),
    z.object({ Sub: pair }).strict().transform(({ Sub: [attr, value] }): Filter => filter.sub(attr, value)),
    z.object({ Pres: z.string() }).strict().transform(({ Pres }): Filter => filter.pres(Pres)),
    z.object({ Or: z.array(FilterSchema) }).strict().transform(({ Or }): Filter => ({ kind: 'or', filters: Or })),
    z.object({ And: z.array(FilterSchema) }).strict().transform(({ And }): Filter => ({ kind: 'and', filters: And })),
    z.object({ AndNot: FilterSchema }).strict().transform(({ AndNot }): Filter => filter.andNot(AndNot)),
    z.literal('Self').transform((): Filter => filter.self()),
  ]),
);

export function encodeFilter(f: Filter): WireValue {
  switch (f.kind) {
    case 'eq':
      return { Eq: [f.attr, f.value] };
    case 'sub':
      return { Sub: [f.attr, f.value] };
    case 'pres':
      return { Pres: f.attr };
    case 'or':
      return { Or: f.filters.map(encodeFilter) };
    case 'and':
      return { And: f.filters.map(encodeFilter) };
    case 'andNot':
      return { AndNot: encodeFilter(f.filter) };
    case 'self':
      return 'Self';
  }
}

/**
 * Decodes a filter from parsed JSON. Nesting is bounded before the value is
 * walked recursively: each filter level costs at most two JSON levels, so a
 * value nested deeper than twice the limit is refused outright.
 */
export function decodeFilter(raw: unknown, limits: FilterLimits = {}): Result<Filter, OperationError> {
  const maxDepth = limits.maxDepth ?? DEFAULT_FILTER_DEPTH_LIMIT;
  if (jsonDepth(raw) > maxDepth * 2) return err({ kind: 'FilterTooDeep', limit: maxDepth });

  const decoded = decodeWith(FilterSchema, raw);
  if (!decoded.ok) return decoded;
  if (filterDepth(decoded.value) > maxDepth) return err({ kind: 'FilterTooDeep', limit: maxDepth });
  return ok(decoded.value);
}
