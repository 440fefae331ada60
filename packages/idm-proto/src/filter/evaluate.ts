import type { Filter } from './types.js';
import type { Entry } from '../entry.js';
import { entryValues } from '../entry.js';
import { containsSelf } from './canonical.js';
import type { OperationError } from '../errors.js';
import type { Result } from '../result.js';
import { ok, err } from '../result.js';

export interface MatchContext {
  /** UUID of the requesting principal, when there is one. */
  selfUuid?: string | null;
}

/**
 * Evaluates a filter against one entry. `self` matches the entry whose
 * `uuid` equals `context.selfUuid` and nothing when there is no identity.
 */
export function matchesFilter(entry: Entry, f: Filter, context: MatchContext = {}): boolean {
  switch (f.kind) {
    case 'eq':
      return entryValues(entry, f.attr).includes(f.value);
    case 'sub':
      return entryValues(entry, f.attr).some((v) => v.includes(f.value));
    case 'pres':
      return entryValues(entry, f.attr).length > 0;
    case 'and':
      return f.filters.every((child) => matchesFilter(entry, child, context));
    case 'or':
      return f.filters.some((child) => matchesFilter(entry, child, context));
    case 'andNot':
      return !matchesFilter(entry, f.filter, context);
    case 'self': {
      const selfUuid = context.selfUuid ?? null;
      return selfUuid !== null && entryValues(entry, 'uuid').includes(selfUuid);
    }
  }
}

function substituteSelf(f: Filter, replacement: Filter): Filter {
  switch (f.kind) {
    case 'self':
      return replacement;
    case 'and':
    case 'or':
      return { kind: f.kind, filters: f.filters.map((child) => substituteSelf(child, replacement)) };
    case 'andNot':
      return { kind: 'andNot', filter: substituteSelf(f.filter, replacement) };
    default:
      return f;
  }
}

/**
 * Replaces every `self` with `eq("uuid", selfUuid)`. Fails with
 * FilterUUIDResolution when the filter needs an identity and there is none.
 */
export function resolveSelf(f: Filter, selfUuid: string | null): Result<Filter, OperationError> {
  if (!containsSelf(f)) return ok(f);
  if (selfUuid === null) return err({ kind: 'FilterUUIDResolution' });
  return ok(substituteSelf(f, { kind: 'eq', attr: 'uuid', value: selfUuid }));
}
