import type { OperationError, Result, SearchRequest, SearchResponse, UserAuthToken } from 'idm-proto';
import { ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { prepareFilter, redact } from '../operation.js';

export async function search(
  deps: OperationDeps,
  token: UserAuthToken,
  req: SearchRequest,
): Promise<Result<SearchResponse, OperationError>> {
  const prepared = prepareFilter(req.filter, token, deps.filterLimits);
  if (!prepared.ok) return prepared;

  const found = await deps.store.evaluate(prepared.value);
  if (!found.ok) return found;
  return ok(response.search(found.value.map(redact)));
}
