import type {
  AuthNegotiator,
  Entry,
  EntryStore,
  Filter,
  FilterLimits,
  OperationError,
  Result,
  SchemaValidator,
  UserAuthToken,
} from 'idm-proto';
import {
  OperationFailure,
  canonicalize,
  createEntry,
  err,
  filterAttributes,
  isAlwaysFalse,
  resolveSelf,
  schemaViolation,
} from 'idm-proto';

/** What every authenticated operation runs against. */
export interface OperationDeps {
  store: EntryStore;
  schema: SchemaValidator;
  filterLimits: FilterLimits;
}

/** What route registration needs. */
export interface RouteContext {
  operations: OperationDeps;
  negotiator: AuthNegotiator;
}

/** Attributes never returned to a client. */
export const REDACTED_ATTRIBUTES: readonly string[] = ['password'];

/** True when any of `attrs` is one a client may neither read nor test. */
export function touchesRedacted(attrs: Iterable<string>): boolean {
  for (const attr of attrs) {
    if (REDACTED_ATTRIBUTES.includes(attr)) return true;
  }
  return false;
}

/**
 * Refuses filters over redacted attributes, resolves `self` against the
 * caller, canonicalizes, and refuses a filter that can match nothing.
 */
export function prepareFilter(f: Filter, token: UserAuthToken, limits: FilterLimits): Result<Filter, OperationError> {
  if (touchesRedacted(filterAttributes(f))) return err({ kind: 'AccessDenied' });
  const resolved = resolveSelf(f, token.uuid);
  if (!resolved.ok) return resolved;
  const canonical = canonicalize(resolved.value, limits);
  if (!canonical.ok) return canonical;
  if (isAlwaysFalse(canonical.value)) return err(schemaViolation({ kind: 'EmptyFilter' }));
  return canonical;
}

export function redact(entry: Entry): Entry {
  return createEntry(new Map([...entry.attrs].filter(([name]) => !REDACTED_ATTRIBUTES.includes(name))));
}

/** Hands a failed result to the HTTP error handler. */
export function unwrap<T>(result: Result<T, OperationError>): T {
  if (!result.ok) throw new OperationFailure(result.error);
  return result.value;
}
