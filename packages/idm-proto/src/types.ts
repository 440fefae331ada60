import type { Entry } from './entry.js';
import type { Filter } from './filter/types.js';
import type { ModifyList } from './modify.js';
import type { AuthAllowed, AuthCredential, UserAuthToken } from './auth/types.js';
import type { OperationError, SchemaError } from './errors.js';
import type { Result } from './result.js';

/**
 * Storage/query engine. Filters arrive canonical with `self` already
 * resolved; a backend that cannot run a filter answers FilterGeneration.
 */
export interface EntryStore {
  evaluate(filter: Filter): Promise<Result<Entry[], OperationError>>;
  /** Same as evaluate, over soft-deleted entries. */
  evaluateRecycled(filter: Filter): Promise<Result<Entry[], OperationError>>;
  create(entries: readonly Entry[]): Promise<Result<void, OperationError>>;
  /** Moves matching live entries to the recycle bin. */
  delete(filter: Filter): Promise<Result<void, OperationError>>;
  /**
   * Applies `modlist` to every match. When `schema` is given each modified
   * entry must pass it, checked against the same selection that is written.
   */
  modify(filter: Filter, modlist: ModifyList, schema?: SchemaValidator): Promise<Result<void, OperationError>>;
  /** Moves matching recycled entries back to live. */
  revive(filter: Filter): Promise<Result<void, OperationError>>;
}

export interface SchemaValidator {
  validate(entry: Entry): Result<void, SchemaError>;
}

/**
 * Credential checks for the negotiation. The negotiator never sees secrets
 * beyond handing them through.
 */
export interface CredentialVerifier {
  /**
   * Mechanisms that must all be satisfied for this principal, or null when
   * the principal (or requested application) is unknown or locked.
   */
  requiredMechanisms(principal: string, appid: string | null): Promise<AuthAllowed[] | null>;
  verify(principal: string, credentials: readonly AuthCredential[]): Promise<boolean>;
  /** Token for a principal that has satisfied every mechanism. */
  userToken(principal: string, appid: string | null): Promise<UserAuthToken | null>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };
