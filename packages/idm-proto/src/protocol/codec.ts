import { z } from 'zod';
import type {
  CreateRequest,
  DeleteRequest,
  ModifyRequest,
  ReviveRecycledRequest,
  SearchRecycledRequest,
  SearchRequest,
  SearchResponse,
  WhoamiResponse,
} from './messages.js';
import type { ConsistencyError, ConsistencyResult, OperationError, SchemaError } from '../errors.js';
import { CONSISTENCY_ERROR_UNITS, OPERATION_ERROR_UNITS, SCHEMA_ERROR_UNITS } from '../errors.js';
import { EntrySchema, encodeEntry } from '../entry.js';
import type { Filter, FilterLimits } from '../filter/types.js';
import { decodeFilter, encodeFilter } from '../filter/codec.js';
import { ModifyListSchema, encodeModifyList } from '../modify.js';
import { UserAuthTokenSchema, encodeUserAuthToken } from '../auth/codec.js';
import type { Result } from '../result.js';
import { ok } from '../result.js';
import type { WireValue } from '../wire.js';
import { decodeWith } from '../wire.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const SchemaErrorSchema = z.union([
  z.enum(SCHEMA_ERROR_UNITS).transform((kind): SchemaError => ({ kind })),
  z
    .object({ MissingMustAttribute: z.string() })
    .strict()
    .transform(({ MissingMustAttribute }): SchemaError => ({ kind: 'MissingMustAttribute', attr: MissingMustAttribute })),
]);

const entryId = z.number().int().nonnegative();

export const ConsistencyErrorSchema = z.union([
  z.enum(CONSISTENCY_ERROR_UNITS).transform((kind): ConsistencyError => ({ kind })),
  z
    .object({ SchemaClassMissingAttribute: z.tuple([z.string(), z.string()]) })
    .strict()
    .transform(
      ({ SchemaClassMissingAttribute: [className, attr] }): ConsistencyError => ({
        kind: 'SchemaClassMissingAttribute',
        className,
        attr,
      }),
    ),
  z
    .object({ EntryUuidCorrupt: entryId })
    .strict()
    .transform(({ EntryUuidCorrupt }): ConsistencyError => ({ kind: 'EntryUuidCorrupt', id: EntryUuidCorrupt })),
  z
    .object({ UuidIndexCorrupt: z.string() })
    .strict()
    .transform(({ UuidIndexCorrupt }): ConsistencyError => ({ kind: 'UuidIndexCorrupt', uuid: UuidIndexCorrupt })),
  z
    .object({ UuidNotUnique: z.string() })
    .strict()
    .transform(({ UuidNotUnique }): ConsistencyError => ({ kind: 'UuidNotUnique', uuid: UuidNotUnique })),
  z
    .object({ RefintNotUpheld: entryId })
    .strict()
    .transform(({ RefintNotUpheld }): ConsistencyError => ({ kind: 'RefintNotUpheld', id: RefintNotUpheld })),
  z
    .object({ MemberOfInvalid: entryId })
    .strict()
    .transform(({ MemberOfInvalid }): ConsistencyError => ({ kind: 'MemberOfInvalid', id: MemberOfInvalid })),
  z
    .object({ InvalidAttributeType: z.string() })
    .strict()
    .transform(({ InvalidAttributeType }): ConsistencyError => ({
      kind: 'InvalidAttributeType',
      detail: InvalidAttributeType,
    })),
  z
    .object({ DuplicateUniqueAttribute: z.string() })
    .strict()
    .transform(({ DuplicateUniqueAttribute }): ConsistencyError => ({
      kind: 'DuplicateUniqueAttribute',
      attr: DuplicateUniqueAttribute,
    })),
]);

export const ConsistencyResultSchema = z.union([
  z
    .object({ Ok: z.null() })
    .strict()
    .transform((): ConsistencyResult => ({ ok: true, value: undefined })),
  z
    .object({ Err: ConsistencyErrorSchema })
    .strict()
    .transform(({ Err }): ConsistencyResult => ({ ok: false, error: Err })),
]);

export const OperationErrorSchema = z.union([
  z.enum(OPERATION_ERROR_UNITS).transform((kind): OperationError => ({ kind })),
  z
    .object({ CorruptedEntry: entryId })
    .strict()
    .transform(({ CorruptedEntry }): OperationError => ({ kind: 'CorruptedEntry', id: CorruptedEntry })),
  z
    .object({ ConsistencyError: z.array(ConsistencyResultSchema) })
    .strict()
    .transform(({ ConsistencyError }): OperationError => ({ kind: 'ConsistencyError', results: ConsistencyError })),
  z
    .object({ SchemaViolation: SchemaErrorSchema })
    .strict()
    .transform(({ SchemaViolation }): OperationError => ({ kind: 'SchemaViolation', error: SchemaViolation })),
  z
    .object({ FilterTooDeep: z.number().int().positive() })
    .strict()
    .transform(({ FilterTooDeep }): OperationError => ({ kind: 'FilterTooDeep', limit: FilterTooDeep })),
  z
    .object({ InvalidAttributeName: z.string() })
    .strict()
    .transform(({ InvalidAttributeName }): OperationError => ({ kind: 'InvalidAttributeName', name: InvalidAttributeName })),
  z
    .object({ InvalidAttribute: z.string() })
    .strict()
    .transform(({ InvalidAttribute }): OperationError => ({ kind: 'InvalidAttribute', detail: InvalidAttribute })),
  z
    .object({ InvalidACPState: z.string() })
    .strict()
    .transform(({ InvalidACPState }): OperationError => ({ kind: 'InvalidACPState', detail: InvalidACPState })),
  z
    .object({ InvalidSchemaState: z.string() })
    .strict()
    .transform(({ InvalidSchemaState }): OperationError => ({ kind: 'InvalidSchemaState', detail: InvalidSchemaState })),
  z
    .object({ InvalidAccountState: z.string() })
    .strict()
    .transform(({ InvalidAccountState }): OperationError => ({
      kind: 'InvalidAccountState',
      detail: InvalidAccountState,
    })),
  z
    .object({ InvalidAuthState: z.string() })
    .strict()
    .transform(({ InvalidAuthState }): OperationError => ({ kind: 'InvalidAuthState', detail: InvalidAuthState })),
]);

export function encodeSchemaError(error: SchemaError): WireValue {
  return error.kind === 'MissingMustAttribute' ? { MissingMustAttribute: error.attr } : error.kind;
}

export function encodeConsistencyError(error: ConsistencyError): WireValue {
  switch (error.kind) {
    case 'SchemaClassMissingAttribute':
      return { SchemaClassMissingAttribute: [error.className, error.attr] };
    case 'EntryUuidCorrupt':
      return { EntryUuidCorrupt: error.id };
    case 'UuidIndexCorrupt':
      return { UuidIndexCorrupt: error.uuid };
    case 'UuidNotUnique':
      return { UuidNotUnique: error.uuid };
    case 'RefintNotUpheld':
      return { RefintNotUpheld: error.id };
    case 'MemberOfInvalid':
      return { MemberOfInvalid: error.id };
    case 'InvalidAttributeType':
      return { InvalidAttributeType: error.detail };
    case 'DuplicateUniqueAttribute':
      return { DuplicateUniqueAttribute: error.attr };
    default:
      return error.kind;
  }
}

export function encodeConsistencyResult(result: ConsistencyResult): WireValue {
  return result.ok ? { Ok: null } : { Err: encodeConsistencyError(result.error) };
}

export function encodeOperationError(error: OperationError): WireValue {
  switch (error.kind) {
    case 'CorruptedEntry':
      return { CorruptedEntry: error.id };
    case 'ConsistencyError':
      return { ConsistencyError: error.results.map(encodeConsistencyResult) };
    case 'SchemaViolation':
      return { SchemaViolation: encodeSchemaError(error.error) };
    case 'FilterTooDeep':
      return { FilterTooDeep: error.limit };
    case 'InvalidAttributeName':
      return { InvalidAttributeName: error.name };
    case 'InvalidAttribute':
    case 'InvalidACPState':
    case 'InvalidSchemaState':
    case 'InvalidAccountState':
    case 'InvalidAuthState':
      return { [error.kind]: error.detail };
    default:
      return error.kind;
  }
}

export function decodeOperationError(raw: unknown): Result<OperationError, OperationError> {
  return decodeWith(OperationErrorSchema, raw);
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

const FilterEnvelopeSchema = z.object({ filter: z.unknown() });

function decodeFilterEnvelope(raw: unknown, limits: FilterLimits): Result<Filter, OperationError> {
  const envelope = decodeWith(FilterEnvelopeSchema, raw);
  if (!envelope.ok) return envelope;
  return decodeFilter(envelope.value.filter, limits);
}

export function decodeSearchRequest(raw: unknown, limits: FilterLimits = {}): Result<SearchRequest, OperationError> {
  const decoded = decodeFilterEnvelope(raw, limits);
  return decoded.ok ? ok({ filter: decoded.value }) : decoded;
}

export function decodeDeleteRequest(raw: unknown, limits: FilterLimits = {}): Result<DeleteRequest, OperationError> {
  const decoded = decodeFilterEnvelope(raw, limits);
  return decoded.ok ? ok({ filter: decoded.value }) : decoded;
}

export function decodeSearchRecycledRequest(
  raw: unknown,
  limits: FilterLimits = {},
): Result<SearchRecycledRequest, OperationError> {
  const decoded = decodeFilterEnvelope(raw, limits);
  return decoded.ok ? ok({ filter: decoded.value }) : decoded;
}

export function decodeReviveRecycledRequest(
  raw: unknown,
  limits: FilterLimits = {},
): Result<ReviveRecycledRequest, OperationError> {
  const decoded = decodeFilterEnvelope(raw, limits);
  return decoded.ok ? ok({ filter: decoded.value }) : decoded;
}

const ModifyEnvelopeSchema = z.object({ filter: z.unknown(), modlist: ModifyListSchema });

export function decodeModifyRequest(raw: unknown, limits: FilterLimits = {}): Result<ModifyRequest, OperationError> {
  const envelope = decodeWith(ModifyEnvelopeSchema, raw);
  if (!envelope.ok) return envelope;
  const decoded = decodeFilter(envelope.value.filter, limits);
  if (!decoded.ok) return decoded;
  return ok({ filter: decoded.value, modlist: envelope.value.modlist });
}

export const CreateRequestSchema = z.object({ entries: z.array(EntrySchema) });

export function decodeCreateRequest(raw: unknown): Result<CreateRequest, OperationError> {
  return decodeWith(CreateRequestSchema, raw);
}

export function encodeFilterRequest(req: { readonly filter: Filter }): WireValue {
  return { filter: encodeFilter(req.filter) };
}

export function encodeCreateRequest(req: CreateRequest): WireValue {
  return { entries: req.entries.map(encodeEntry) };
}

export function encodeModifyRequest(req: ModifyRequest): WireValue {
  return { filter: encodeFilter(req.filter), modlist: encodeModifyList(req.modlist) };
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const SearchResponseSchema = z.object({ entries: z.array(EntrySchema) });

export const WhoamiResponseSchema = z.object({ youare: EntrySchema, uat: UserAuthTokenSchema });

export function decodeSearchResponse(raw: unknown): Result<SearchResponse, OperationError> {
  return decodeWith(SearchResponseSchema, raw);
}

export function decodeWhoamiResponse(raw: unknown): Result<WhoamiResponse, OperationError> {
  return decodeWith(WhoamiResponseSchema, raw);
}

export function encodeSearchResponse(res: SearchResponse): WireValue {
  return { entries: res.entries.map(encodeEntry) };
}

export function encodeWhoamiResponse(res: WhoamiResponse): WireValue {
  return { youare: encodeEntry(res.youare), uat: encodeUserAuthToken(res.uat) };
}
