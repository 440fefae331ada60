import type { DeleteRequest, OperationError, OperationResponse, Result, UserAuthToken } from 'idm-proto';
import { ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { prepareFilter } from '../operation.js';

/** Moves matching entries to the recycle bin. */
export async function deleteEntries(
  deps: OperationDeps,
  token: UserAuthToken,
  req: DeleteRequest,
): Promise<Result<OperationResponse, OperationError>> {
  const prepared = prepareFilter(req.filter, token, deps.filterLimits);
  if (!prepared.ok) return prepared;

  const deleted = await deps.store.delete(prepared.value);
  if (!deleted.ok) return deleted;
  return ok(response.operation());
}
