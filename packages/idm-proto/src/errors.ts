import type { Result } from './result.js';

export const SCHEMA_ERROR_UNITS = [
  'NotImplemented',
  'InvalidClass',
  'InvalidAttribute',
  'InvalidAttributeSyntax',
  'EmptyFilter',
  'Corrupted',
] as const;

/** Entry-shape violations reported by schema validation. */
export type SchemaError =
  | { kind: (typeof SCHEMA_ERROR_UNITS)[number] }
  | { kind: 'MissingMustAttribute'; attr: string };

export const CONSISTENCY_ERROR_UNITS = ['Unknown', 'QueryServerSearchFailure'] as const;

/** Structural-integrity faults found by a consistency pass. */
export type ConsistencyError =
  | { kind: (typeof CONSISTENCY_ERROR_UNITS)[number] }
  | { kind: 'SchemaClassMissingAttribute'; className: string; attr: string }
  | { kind: 'EntryUuidCorrupt'; id: number }
  | { kind: 'UuidIndexCorrupt'; uuid: string }
  | { kind: 'UuidNotUnique'; uuid: string }
  | { kind: 'RefintNotUpheld'; id: number }
  | { kind: 'MemberOfInvalid'; id: number }
  | { kind: 'InvalidAttributeType'; detail: string }
  | { kind: 'DuplicateUniqueAttribute'; attr: string };

/** One check of a consistency pass. */
export type ConsistencyResult = Result<void, ConsistencyError>;

export const OPERATION_ERROR_UNITS = [
  'EmptyRequest',
  'Backend',
  'NoMatchingEntries',
  'Plugin',
  'FilterGeneration',
  'FilterUUIDResolution',
  'InvalidDBState',
  'InvalidEntryID',
  'InvalidRequestState',
  'InvalidState',
  'InvalidEntryState',
  'InvalidUuid',
  'BackendEngine',
  'SQLError',
  'FsError',
  'SerdeJsonError',
  'AccessDenied',
  'NotAuthenticated',
  'InvalidSessionState',
  'SystemProtectedObject',
] as const;

/** Variants of OperationError that carry a free-text detail. */
export const OPERATION_ERROR_DETAILS = [
  'InvalidAttribute',
  'InvalidACPState',
  'InvalidSchemaState',
  'InvalidAccountState',
  'InvalidAuthState',
] as const;

/** Top-level failure taxonomy returned by every operation. */
export type OperationError =
  | { kind: (typeof OPERATION_ERROR_UNITS)[number] }
  | { kind: (typeof OPERATION_ERROR_DETAILS)[number]; detail: string }
  | { kind: 'CorruptedEntry'; id: number }
  | { kind: 'ConsistencyError'; results: ConsistencyResult[] }
  | { kind: 'SchemaViolation'; error: SchemaError }
  | { kind: 'FilterTooDeep'; limit: number }
  | { kind: 'InvalidAttributeName'; name: string };

export type OperationErrorKind = OperationError['kind'];

/** Wraps an entry-shape failure for the operation layer. */
export function schemaViolation(error: SchemaError): OperationError {
  return { kind: 'SchemaViolation', error };
}

/**
 * Wraps a consistency pass. Returns null when every check passed, so the
 * caller can carry on without inspecting the results itself.
 */
export function consistencyFailure(results: ConsistencyResult[]): OperationError | null {
  if (results.every((r) => r.ok)) return null;
  return { kind: 'ConsistencyError', results };
}

function describeSchemaError(error: SchemaError): string {
  return error.kind === 'MissingMustAttribute' ? `MissingMustAttribute(${error.attr})` : error.kind;
}

function describeConsistencyError(error: ConsistencyError): string {
  switch (error.kind) {
    case 'SchemaClassMissingAttribute':
      return `${error.kind}(${error.className}, ${error.attr})`;
    case 'EntryUuidCorrupt':
    case 'RefintNotUpheld':
    case 'MemberOfInvalid':
      return `${error.kind}(${error.id})`;
    case 'UuidIndexCorrupt':
    case 'UuidNotUnique':
      return `${error.kind}(${error.uuid})`;
    case 'InvalidAttributeType':
      return `${error.kind}(${error.detail})`;
    case 'DuplicateUniqueAttribute':
      return `${error.kind}(${error.attr})`;
    default:
      return error.kind;
  }
}

/** Single-line rendering for logs. */
export function describeOperationError(error: OperationError): string {
  switch (error.kind) {
    case 'CorruptedEntry':
      return `CorruptedEntry(${error.id})`;
    case 'ConsistencyError': {
      const failed = error.results.flatMap((r) => (r.ok ? [] : [describeConsistencyError(r.error)]));
      return `ConsistencyError(${failed.join(', ')})`;
    }
    case 'SchemaViolation':
      return `SchemaViolation(${describeSchemaError(error.error)})`;
    case 'FilterTooDeep':
      return `FilterTooDeep(${error.limit})`;
    case 'InvalidAttributeName':
      return `InvalidAttributeName(${error.name})`;
    case 'InvalidAttribute':
    case 'InvalidACPState':
    case 'InvalidSchemaState':
    case 'InvalidAccountState':
    case 'InvalidAuthState':
      return `${error.kind}(${error.detail})`;
    default:
      return error.kind;
  }
}

/**
 * Carries an OperationError across a boundary that only understands
 * exceptions (an HTTP framework's error hook). The core never throws it.
 */
export class OperationFailure extends Error {
  override readonly name = 'OperationFailure';

  constructor(
    readonly error: OperationError,
    message?: string,
  ) {
    super(message ?? `Operation failed: ${describeOperationError(error)}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
