import { describe, it, expect } from 'vitest';
import { createEntry } from '../../src/entry.js';
import { filter } from '../../src/filter/filter-object.js';
import { matchesFilter, resolveSelf } from '../../src/filter/evaluate.js';

const alice = createEntry({
  class: ['account', 'person'],
  name: ['alice'],
  mail: ['alice@example.com', 'a@example.com'],
  uuid: ['00000000-0000-0000-0000-0000000000a1'],
});

describe('matchesFilter', () => {
  it('eq matches any one value exactly', () => {
    expect(matchesFilter(alice, filter.eq('class', 'person'))).toBe(true);
    expect(matchesFilter(alice, filter.eq('class', 'pers'))).toBe(false);
    expect(matchesFilter(alice, filter.eq('missing', 'x'))).toBe(false);
  });

  it('sub is a case-sensitive substring test', () => {
    expect(matchesFilter(alice, filter.sub('mail', '@example'))).toBe(true);
    expect(matchesFilter(alice, filter.sub('name', 'LIC'))).toBe(false);
  });

  it('pres requires the attribute', () => {
    expect(matchesFilter(alice, filter.pres('mail'))).toBe(true);
    expect(matchesFilter(alice, filter.pres('password'))).toBe(false);
  });

  it('empty and matches everything, empty or nothing', () => {
    expect(matchesFilter(alice, filter.and())).toBe(true);
    expect(matchesFilter(alice, filter.or())).toBe(false);
  });

  it('combines children', () => {
    const f = filter.and(filter.eq('name', 'alice'), filter.or(filter.pres('x'), filter.sub('mail', 'a@')));
    expect(matchesFilter(alice, f)).toBe(true);
    expect(matchesFilter(alice, filter.andNot(f))).toBe(false);
  });

  it('self compares the entry uuid with the caller', () => {
    expect(matchesFilter(alice, filter.self(), { selfUuid: '00000000-0000-0000-0000-0000000000a1' })).toBe(true);
    expect(matchesFilter(alice, filter.self(), { selfUuid: '00000000-0000-0000-0000-0000000000b2' })).toBe(false);
    expect(matchesFilter(alice, filter.self())).toBe(false);
  });
});

describe('resolveSelf', () => {
  it('leaves a filter without self untouched', () => {
    const f = filter.eq('name', 'alice');
    expect(resolveSelf(f, null)).toEqual({ ok: true, value: f });
  });

  it('replaces every self with an eq on uuid', () => {
    const f = filter.or(filter.self(), filter.andNot(filter.self()));
    expect(resolveSelf(f, 'u-1')).toEqual({
      ok: true,
      value: filter.or(filter.eq('uuid', 'u-1'), filter.andNot(filter.eq('uuid', 'u-1'))),
    });
  });

  it('fails without an identity', () => {
    expect(resolveSelf(filter.and(filter.self()), null)).toEqual({
      ok: false,
      error: { kind: 'FilterUUIDResolution' },
    });
  });
});
