import type { Entry } from '../entry.js';
import type { Filter } from '../filter/types.js';
import type { ModifyList } from '../modify.js';
import type { UserAuthToken } from '../auth/types.js';

export interface SearchRequest {
  readonly filter: Filter;
}

export interface SearchResponse {
  readonly entries: readonly Entry[];
}

export interface CreateRequest {
  readonly entries: readonly Entry[];
}

export interface DeleteRequest {
  readonly filter: Filter;
}

export interface ModifyRequest {
  /** Selects the entries to change. */
  readonly filter: Filter;
  readonly modlist: ModifyList;
}

/** Empty acknowledgement. */
export type OperationResponse = Record<string, never>;

export interface SearchRecycledRequest {
  readonly filter: Filter;
}

export interface ReviveRecycledRequest {
  readonly filter: Filter;
}

/** Carries nothing: the caller is identified by its session. */
export type WhoamiRequest = Record<string, never>;

export interface WhoamiResponse {
  readonly youare: Entry;
  readonly uat: UserAuthToken;
}

export const request = {
  search(filter: Filter): SearchRequest {
    return { filter };
  },
  create(entries: readonly Entry[]): CreateRequest {
    return { entries: [...entries] };
  },
  delete(filter: Filter): DeleteRequest {
    return { filter };
  },
  modify(filter: Filter, modlist: ModifyList): ModifyRequest {
    return { filter, modlist };
  },
  searchRecycled(filter: Filter): SearchRecycledRequest {
    return { filter };
  },
  reviveRecycled(filter: Filter): ReviveRecycledRequest {
    return { filter };
  },
  whoami(): WhoamiRequest {
    return {};
  },
};

export const response = {
  search(entries: readonly Entry[]): SearchResponse {
    return { entries: [...entries] };
  },
  operation(): OperationResponse {
    return {};
  },
  whoami(youare: Entry, uat: UserAuthToken): WhoamiResponse {
    return { youare, uat };
  },
};
