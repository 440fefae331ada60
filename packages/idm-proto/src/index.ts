export type { Ok, Err, Result } from './result.js';
export { ok, err, OK_VOID } from './result.js';

export type { Entry, EntryAttrs } from './entry.js';
export {
  createEntry,
  entryValues,
  entryFirstValue,
  entryHasValue,
  entryToRecord,
  encodeEntry,
  EntrySchema,
} from './entry.js';

export type { Filter, FilterKind, FilterLimits } from './filter/types.js';
export { DEFAULT_FILTER_DEPTH_LIMIT } from './filter/types.js';
export { filter, ALWAYS_TRUE, ALWAYS_FALSE } from './filter/filter-object.js';
export { FilterBuilder } from './filter/builder.js';
export { compareFilters, filtersEqual } from './filter/order.js';
export {
  canonicalize,
  filtersEquivalent,
  filterDepth,
  containsSelf,
  filterAttributes,
  isAlwaysTrue,
  isAlwaysFalse,
} from './filter/canonical.js';
export type { MatchContext } from './filter/evaluate.js';
export { matchesFilter, resolveSelf } from './filter/evaluate.js';
export type { CompiledQuery, SearchQueryOptions } from './filter/compiler.js';
export { compileFilter, compileSearchQuery, compileCanonicalKey } from './filter/compiler.js';
export { FilterSchema, encodeFilter, decodeFilter } from './filter/codec.js';

export type { Modify, ModifyList } from './modify.js';
export {
  modify,
  createModifyList,
  modifiedAttributes,
  applyModifyList,
  ModifyListSchema,
  encodeModify,
  encodeModifyList,
} from './modify.js';

export type {
  SchemaError,
  ConsistencyError,
  ConsistencyResult,
  OperationError,
  OperationErrorKind,
} from './errors.js';
export { schemaViolation, consistencyFailure, describeOperationError, OperationFailure } from './errors.js';

export type {
  Group,
  Claim,
  Application,
  UserAuthToken,
  AuthCredential,
  AuthAllowed,
  AuthStep,
  AuthState,
  AuthRequest,
  AuthResponse,
} from './auth/types.js';
export { AUTH_MECHANISMS, DENIED_REASON, authStep, credential, describeUserAuthToken } from './auth/types.js';
export {
  AuthRequestSchema,
  AuthResponseSchema,
  encodeAuthRequest,
  encodeAuthResponse,
  encodeUserAuthToken,
} from './auth/codec.js';
export type { SessionPhase, SessionRecord, SessionStoreConfig } from './auth/session-store.js';
export { SessionStore, DEFAULT_SESSION_TTL_MS } from './auth/session-store.js';
export type { AuthNegotiatorConfig } from './auth/negotiator.js';
export { AuthNegotiator } from './auth/negotiator.js';

export type {
  SearchRequest,
  SearchResponse,
  CreateRequest,
  DeleteRequest,
  ModifyRequest,
  OperationResponse,
  SearchRecycledRequest,
  ReviveRecycledRequest,
  WhoamiRequest,
  WhoamiResponse,
} from './protocol/messages.js';
export { request, response } from './protocol/messages.js';
export {
  decodeSearchRequest,
  decodeCreateRequest,
  decodeDeleteRequest,
  decodeModifyRequest,
  decodeSearchRecycledRequest,
  decodeReviveRecycledRequest,
  decodeSearchResponse,
  decodeWhoamiResponse,
  decodeOperationError,
  encodeFilterRequest,
  encodeCreateRequest,
  encodeModifyRequest,
  encodeSearchResponse,
  encodeWhoamiResponse,
  encodeOperationError,
  encodeSchemaError,
  encodeConsistencyError,
} from './protocol/codec.js';

export type { EntryStore, SchemaValidator, CredentialVerifier, Clock } from './types.js';
export { systemClock } from './types.js';
export type { SchemaClasses, SchemaValidatorConfig } from './schema/validator.js';
export { createSchemaValidator, DEFAULT_SCHEMA_CLASSES, ATTRIBUTE_NAME_PATTERN } from './schema/validator.js';
export type { ConsistencyOptions } from './schema/consistency.js';
export { checkConsistency } from './schema/consistency.js';

export type { WireValue } from './wire.js';
export { parseJson, decodeWith, jsonDepth } from './wire.js';
