import type { Filter, FilterLimits } from './types.js';
import { DEFAULT_FILTER_DEPTH_LIMIT } from './types.js';
import { compareFilters } from './order.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { ok, err } from '../result.js';

/**
 * Canonicalizes one node at the given depth (1 for the root).
 * Depth is checked before descending, so an over-deep tree is rejected
 * after at most maxDepth frames.
 */
function canonicalNode(node: Filter, depth: number, maxDepth: number): Result<Filter, OperationError> {
  if (depth > maxDepth) {
    return err({ kind: 'FilterTooDeep', limit: maxDepth });
  }

  switch (node.kind) {
    case 'eq':
    case 'sub':
    case 'pres':
    case 'self':
      return ok(node);

    case 'andNot': {
      const inner = canonicalNode(node.filter, depth + 1, maxDepth);
      if (!inner.ok) return inner;
      const negated: Filter = { kind: 'andNot', filter: inner.value };
      return ok(negated);
    }

    case 'and':
    case 'or': {
      const flat: Filter[] = [];
      for (const child of node.filters) {
        const c = canonicalNode(child, depth + 1, maxDepth);
        if (!c.ok) return c;
        // Children are already canonical, so one level of flattening suffices
        const value = c.value;
        if ((value.kind === 'and' || value.kind === 'or') && value.kind === node.kind) {
          for (const grandchild of value.filters) flat.push(grandchild);
        } else {
          flat.push(value);
        }
      }

      flat.sort(compareFilters);
      const unique = flat.filter((f, i) => i === 0 || compareFilters(flat[i - 1] ?? f, f) !== 0);

      if (unique.length === 1 && unique[0] !== undefined) return ok(unique[0]);
      const combined: Filter = { kind: node.kind, filters: unique };
      return ok(combined);
    }
  }
}

/**
 * Produces the canonical form of a filter: children canonicalized first,
 * nested and/and and or/or flattened, children sorted under
 * compareFilters with exact duplicates dropped, and a combinator left
 * with a single child replaced by that child. Empty and/or are kept as the
 * always-true/always-false sentinels.
 *
 * Two filters are equivalent under reordering, regrouping and duplication
 * iff their canonical forms are structurally equal.
 */
export function canonicalize(f: Filter, limits: FilterLimits = {}): Result<Filter, OperationError> {
  return canonicalNode(f, 1, limits.maxDepth ?? DEFAULT_FILTER_DEPTH_LIMIT);
}

/** True when both filters canonicalize (within limits) to the same form. */
export function filtersEquivalent(a: Filter, b: Filter, limits: FilterLimits = {}): boolean {
  const ca = canonicalize(a, limits);
  const cb = canonicalize(b, limits);
  return ca.ok && cb.ok && compareFilters(ca.value, cb.value) === 0;
}

function children(node: Filter): readonly Filter[] {
  switch (node.kind) {
    case 'and':
    case 'or':
      return node.filters;
    case 'andNot':
      return [node.filter];
    default:
      return [];
  }
}

/** Nesting depth, computed without recursion. */
export function filterDepth(f: Filter): number {
  let deepest = 0;
  const stack: Array<[Filter, number]> = [[f, 1]];
  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [node, depth] = item;
    deepest = Math.max(deepest, depth);
    for (const child of children(node)) stack.push([child, depth + 1]);
  }
  return deepest;
}

/** Whether a `self` placeholder occurs anywhere in the tree. */
export function containsSelf(f: Filter): boolean {
  const stack: Filter[] = [f];
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (node.kind === 'self') return true;
    for (const child of children(node)) stack.push(child);
  }
  return false;
}

/** Attribute names the filter asserts on, in no particular order. */
export function filterAttributes(f: Filter): Set<string> {
  const attrs = new Set<string>();
  const stack: Filter[] = [f];
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (node.kind === 'eq' || node.kind === 'sub' || node.kind === 'pres') attrs.add(node.attr);
    for (const child of children(node)) stack.push(child);
  }
  return attrs;
}

export function isAlwaysTrue(f: Filter): boolean {
  return f.kind === 'and' && f.filters.length === 0;
}

export function isAlwaysFalse(f: Filter): boolean {
  return f.kind === 'or' && f.filters.length === 0;
}
