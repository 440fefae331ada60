import { describe, it, expect } from 'vitest';
import { filter } from '../../src/filter/filter-object.js';
import { compileCanonicalKey, compileFilter, compileSearchQuery } from '../../src/filter/compiler.js';
import type { Filter } from '../../src/filter/types.js';

function compiled(f: Filter, offset?: number) {
  const result = compileFilter(f, offset);
  if (!result.ok) throw new Error(`compile failed: ${result.error.kind}`);
  return result.value;
}

describe('compileFilter', () => {
  it('eq - JSONB containment of a one-value array', () => {
    const { sql, params } = compiled(filter.eq('name', 'alice'));
    expect(sql).toBe('attrs @> $1::jsonb');
    expect(params).toEqual([JSON.stringify({ name: ['alice'] })]);
  });

  it('sub - substring over the attribute values', () => {
    const { sql, params } = compiled(filter.sub('name', 'al'));
    expect(sql).toBe(
      'EXISTS (SELECT 1 FROM jsonb_array_elements_text(attrs -> $1) AS v(value) WHERE strpos(v.value, $2) > 0)',
    );
    expect(params).toEqual(['name', 'al']);
  });

  it('pres - key existence', () => {
    const { sql, params } = compiled(filter.pres('mail'));
    expect(sql).toBe('attrs ? $1');
    expect(params).toEqual(['mail']);
  });

  it('and / or - parenthesised, parameters numbered left to right', () => {
    const { sql, params } = compiled(filter.and(filter.eq('a', '1'), filter.or(filter.pres('b'), filter.eq('c', '2'))));
    expect(sql).toBe('(attrs @> $1::jsonb AND (attrs ? $2 OR attrs @> $3::jsonb))');
    expect(params).toEqual([JSON.stringify({ a: ['1'] }), 'b', JSON.stringify({ c: ['2'] })]);
  });

  it('empty and / or - constant predicates', () => {
    expect(compiled(filter.and())).toEqual({ sql: 'TRUE', params: [] });
    expect(compiled(filter.or())).toEqual({ sql: 'FALSE', params: [] });
  });

  it('andNot - NOT around the child', () => {
    expect(compiled(filter.andNot(filter.pres('account_locked')))).toEqual({
      sql: 'NOT (attrs ? $1)',
      params: ['account_locked'],
    });
  });

  it('paramOffset shifts placeholder numbering', () => {
    expect(compiled(filter.eq('a', '1'), 2).sql).toBe('attrs @> $3::jsonb');
  });

  it('refuses an unresolved self', () => {
    expect(compileFilter(filter.and(filter.eq('a', '1'), filter.self()))).toEqual({
      ok: false,
      error: { kind: 'FilterUUIDResolution' },
    });
  });
});

describe('compileSearchQuery', () => {
  it('selects live entries ordered by uuid, recycled flag last', () => {
    const result = compileSearchQuery(filter.eq('name', 'alice'));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.sql).toBe(
      [
        'SELECT entry_uuid, attrs, recycled, updated_at',
        'FROM entries',
        'WHERE recycled = $2 AND attrs @> $1::jsonb',
        'ORDER BY entry_uuid ASC',
      ].join('\n'),
    );
    expect(result.value.params).toEqual([JSON.stringify({ name: ['alice'] }), false]);
  });

  it('searches the recycle bin and locks rows when asked', () => {
    const result = compileSearchQuery(filter.pres('uuid'), { recycled: true, forUpdate: true });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.params).toEqual(['uuid', true]);
    expect(result.value.sql.endsWith('ORDER BY entry_uuid ASC\nFOR UPDATE')).toBe(true);
  });

  it('propagates compile failures', () => {
    expect(compileSearchQuery(filter.self()).ok).toBe(false);
  });
});

describe('compileCanonicalKey', () => {
  it('is the wire encoding of the filter', () => {
    expect(compileCanonicalKey(filter.and(filter.eq('a', '1'), filter.self()))).toBe('{"And":[{"Eq":["a","1"]},"Self"]}');
  });
});
