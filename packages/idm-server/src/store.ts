import pg from 'pg';
import { PostgresEntryStore } from 'idm-proto/store';

export function createStore(
  connectionString: string,
  onError?: (error: unknown, operation: string) => void,
): PostgresEntryStore {
  return new PostgresEntryStore({
    pool: new pg.Pool({ connectionString }),
    ...(onError !== undefined ? { onError } : {}),
  });
}
