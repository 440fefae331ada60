import type { OperationError, Result, UserAuthToken, WhoamiResponse } from 'idm-proto';
import { err, filter, ok, response } from 'idm-proto';
import type { OperationDeps } from '../operation.js';
import { redact } from '../operation.js';

/** The caller's own entry alongside the token its session holds. */
export async function whoami(
  deps: OperationDeps,
  token: UserAuthToken,
): Promise<Result<WhoamiResponse, OperationError>> {
  const found = await deps.store.evaluate(filter.eq('uuid', token.uuid));
  if (!found.ok) return found;

  const [entry, ...rest] = found.value;
  if (entry === undefined) return err({ kind: 'NoMatchingEntries' });
  if (rest.length > 0) return err({ kind: 'InvalidState' });
  return ok(response.whoami(redact(entry), token));
}
