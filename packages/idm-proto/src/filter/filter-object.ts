import type { Filter } from './types.js';
import { FilterBuilder } from './builder.js';

/**
 * Entry point for building filters.
 *
 * @example
 * filter.and(filter.eq('class', 'person'), filter.andNot(filter.pres('account_locked')))
 *
 * filter.where.attr('class').equals('person')
 *   .and.attr('name').contains('al')
 *   .build()
 */
export const filter = {
  eq(attr: string, value: string): Filter {
    return { kind: 'eq', attr, value };
  },
  sub(attr: string, value: string): Filter {
    return { kind: 'sub', attr, value };
  },
  pres(attr: string): Filter {
    return { kind: 'pres', attr };
  },
  or(...filters: Filter[]): Filter {
    return { kind: 'or', filters };
  },
  and(...filters: Filter[]): Filter {
    return { kind: 'and', filters };
  },
  andNot(inner: Filter): Filter {
    return { kind: 'andNot', filter: inner };
  },
  self(): Filter {
    return SELF;
  },
  /** Start a fluent expression. */
  get where() {
    return new FilterBuilder(null).where;
  },
};

const SELF: Filter = { kind: 'self' };

/** Canonical "matches everything". */
export const ALWAYS_TRUE: Filter = { kind: 'and', filters: [] };

/** Canonical "matches nothing". */
export const ALWAYS_FALSE: Filter = { kind: 'or', filters: [] };
