import type { OperationError, Result, SearchRecycledRequest, SearchResponse, UserAuthToken } from 'idm-proto';
import { ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { prepareFilter, redact } from '../operation.js';

export async function searchRecycled(
  deps: OperationDeps,
  token: UserAuthToken,
  req: SearchRecycledRequest,
): Promise<Result<SearchResponse, OperationError>> {
  const prepared = prepareFilter(req.filter, token, deps.filterLimits);
  if (!prepared.ok) return prepared;

  const found = await deps.store.evaluateRecycled(prepared.value);
  if (!found.ok) return found;
  return ok(response.search(found.value.map(redact)));
}
