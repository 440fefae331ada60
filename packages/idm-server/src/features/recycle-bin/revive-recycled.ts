import type { OperationError, OperationResponse, Result, ReviveRecycledRequest, UserAuthToken } from 'idm-proto';
import { ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { prepareFilter } from '../operation.js';

/** Moves matching recycled entries back among the live ones. */
export async function reviveRecycled(
  deps: OperationDeps,
  token: UserAuthToken,
  req: ReviveRecycledRequest,
): Promise<Result<OperationResponse, OperationError>> {
  const prepared = prepareFilter(req.filter, token, deps.filterLimits);
  if (!prepared.ok) return prepared;

  const revived = await deps.store.revive(prepared.value);
  if (!revived.ok) return revived;
  return ok(response.operation());
}
