/**
 * Query expression over entry attributes.
 *
 * `and` with no children always matches, `or` with no children never
 * matches. `self` stands for the requesting principal and is resolved by
 * the backend, never here.
 */
export type Filter =
  | { readonly kind: 'eq'; readonly attr: string; readonly value: string }
  | { readonly kind: 'sub'; readonly attr: string; readonly value: string }
  | { readonly kind: 'pres'; readonly attr: string }
  | { readonly kind: 'or'; readonly filters: readonly Filter[] }
  | { readonly kind: 'and'; readonly filters: readonly Filter[] }
  | { readonly kind: 'andNot'; readonly filter: Filter }
  | { readonly kind: 'self' };

export type FilterKind = Filter['kind'];

export type CombinatorFilter = Extract<Filter, { kind: 'and' | 'or' }>;

export interface FilterLimits {
  /** Deepest nesting accepted; a lone leaf has depth 1. */
  maxDepth?: number;
}

export const DEFAULT_FILTER_DEPTH_LIMIT = 32;
