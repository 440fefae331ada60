import type { ModifyRequest, OperationError, OperationResponse, Result, UserAuthToken } from 'idm-proto';
import { err, modifiedAttributes, ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { prepareFilter, touchesRedacted } from '../operation.js';

/**
 * Applies a modify list to every matching entry. Each modified entry must
 * still pass schema validation, otherwise nothing is written.
 */
export async function modify(
  deps: OperationDeps,
  token: UserAuthToken,
  req: ModifyRequest,
): Promise<Result<OperationResponse, OperationError>> {
  if (req.modlist.mods.length === 0) return err({ kind: 'EmptyRequest' });
  if (touchesRedacted(modifiedAttributes(req.modlist))) return err({ kind: 'AccessDenied' });
  const prepared = prepareFilter(req.filter, token, deps.filterLimits);
  if (!prepared.ok) return prepared;

  const modified = await deps.store.modify(prepared.value, req.modlist, deps.schema);
  if (!modified.ok) return modified;
  return ok(response.operation());
}
