import type { Filter } from './types.js';
import { containsSelf } from './canonical.js';
import { encodeFilter } from './codec.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { ok, err } from '../result.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface SearchQueryOptions {
  /** Search the recycle bin instead of live entries. */
  recycled?: boolean;
  /** Lock matched rows for a following UPDATE. */
  forUpdate?: boolean;
}

/**
 * Compiles a Filter into a SQL predicate over the JSONB `attrs` column and
 * appends parameters. Uses a shared counter object so recursive calls share
 * the same sequence.
 */
function compileFilterNode(
  node: Filter,
  params: unknown[],
  counter: { n: number },
): string {
  switch (node.kind) {
    case 'eq':
      params.push(JSON.stringify({ [node.attr]: [node.value] }));
      counter.n += 1;
      return `attrs @> $${counter.n}::jsonb`;

    case 'sub': {
      params.push(node.attr);
      counter.n += 1;
      const attrRef = `$${counter.n}`;
      params.push(node.value);
      counter.n += 1;
      return `EXISTS (SELECT 1 FROM jsonb_array_elements_text(attrs -> ${attrRef}) AS v(value) WHERE strpos(v.value, $${counter.n}) > 0)`;
    }

    case 'pres':
      params.push(node.attr);
      counter.n += 1;
      return `attrs ? $${counter.n}`;

    case 'and':
    case 'or': {
      if (node.filters.length === 0) return node.kind === 'and' ? 'TRUE' : 'FALSE';
      const parts = node.filters.map((f) => compileFilterNode(f, params, counter));
      return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
    }

    case 'andNot':
      return `NOT (${compileFilterNode(node.filter, params, counter)})`;

    case 'self':
      // compileFilter rejects these before descending
      throw new Error('Unresolved self placeholder reached the SQL compiler');
  }
}

/**
 * Compiles a filter into a WHERE predicate. The filter must have had its
 * `self` placeholders resolved; one left in fails with FilterUUIDResolution.
 *
 * @param paramOffset - number of parameters that precede this predicate in
 *   the caller's param list.
 */
export function compileFilter(f: Filter, paramOffset = 0): Result<CompiledQuery, OperationError> {
  if (containsSelf(f)) return err({ kind: 'FilterUUIDResolution' });
  const params: unknown[] = [];
  const counter = { n: paramOffset };
  const sql = compileFilterNode(f, params, counter);
  return ok({ sql, params });
}

/**
 * Compiles a filter into a full SELECT over the entries table, ordered by
 * entry uuid.
 */
export function compileSearchQuery(
  f: Filter,
  options: SearchQueryOptions = {},
): Result<CompiledQuery, OperationError> {
  const predicate = compileFilter(f);
  if (!predicate.ok) return predicate;

  const params = [...predicate.value.params, options.recycled ?? false];
  const sql = [
    'SELECT entry_uuid, attrs, recycled, updated_at',
    'FROM entries',
    `WHERE recycled = $${params.length} AND ${predicate.value.sql}`,
    'ORDER BY entry_uuid ASC',
    ...(options.forUpdate ? ['FOR UPDATE'] : []),
  ].join('\n');

  return ok({ sql, params });
}

/** Stable textual key for a canonical filter, usable as a cache key. */
export function compileCanonicalKey(f: Filter): string {
  return JSON.stringify(encodeFilter(f));
}
