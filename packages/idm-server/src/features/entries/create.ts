import type { CreateRequest, OperationError, OperationResponse, Result, UserAuthToken } from 'idm-proto';
import { err, ok, response, schemaViolation } from 'idm-proto';
import type { OperationDeps } from '../operation.js';

/** Validates every entry against the schema before anything is stored. */
export async function create(
  deps: OperationDeps,
  _token: UserAuthToken,
  req: CreateRequest,
): Promise<Result<OperationResponse, OperationError>> {
  if (req.entries.length === 0) return err({ kind: 'EmptyRequest' });

  for (const entry of req.entries) {
    const valid = deps.schema.validate(entry);
    if (!valid.ok) return err(schemaViolation(valid.error));
  }

  const created = await deps.store.create(req.entries);
  if (!created.ok) return created;
  return ok(response.operation());
}
