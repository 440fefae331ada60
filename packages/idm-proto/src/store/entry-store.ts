import pg from 'pg';
import type { Entry } from '../entry.js';
import { entryFirstValue, entryToRecord, entryValues } from '../entry.js';
import type { Filter } from '../filter/types.js';
import { compileFilter, compileSearchQuery } from '../filter/compiler.js';
import type { ModifyList } from '../modify.js';
import { applyModifyList, modifiedAttributes } from '../modify.js';
import type { ConsistencyError, OperationError } from '../errors.js';
import { consistencyFailure, schemaViolation } from '../errors.js';
import { checkConsistency } from '../schema/consistency.js';
import type { Result } from '../result.js';
import { OK_VOID, err, ok } from '../result.js';
import type { EntryStore, SchemaValidator } from '../types.js';
import { PROTECTED_ATTRIBUTES, withUuid } from './memory-store.js';
import { applySchema } from './schema.js';
import type { EntryRow } from './row-mapper.js';
import { mapRow } from './row-mapper.js';

export interface PostgresEntryStoreConfig {
  pool: pg.Pool;
  /** Receives infrastructure failures before they are reduced to an OperationError. */
  onError?: (error: unknown, operation: string) => void;
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === UNIQUE_VIOLATION;
}

const INSERT_SQL = 'INSERT INTO entries (entry_uuid, attrs) VALUES ($1, $2::jsonb)';
const UPDATE_ATTRS_SQL = 'UPDATE entries SET attrs = $2::jsonb, updated_at = NOW() WHERE entry_uuid = $1';
const EXISTING_UUIDS_SQL = 'SELECT entry_uuid FROM entries WHERE entry_uuid = ANY($1::text[])';

/**
 * Entry store over a single `entries` table. Attributes live in one JSONB
 * column; deletion flips `recycled`. Mutations run in a transaction.
 */
export class PostgresEntryStore implements EntryStore {
  private readonly pool: pg.Pool;
  private readonly onError: (error: unknown, operation: string) => void;

  constructor(config: PostgresEntryStoreConfig) {
    this.pool = config.pool;
    this.onError = config.onError ?? (() => undefined);
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async evaluate(filter: Filter): Promise<Result<Entry[], OperationError>> {
    return this.search(filter, false);
  }

  async evaluateRecycled(filter: Filter): Promise<Result<Entry[], OperationError>> {
    return this.search(filter, true);
  }

  async create(entries: readonly Entry[]): Promise<Result<void, OperationError>> {
    if (entries.length === 0) return err({ kind: 'EmptyRequest' });
    const prepared = entries.map((e) => withUuid(e));

    return this.transaction('create', async (client): Promise<Result<void, OperationError>> => {
      const batch = new Set(prepared.flatMap((e) => entryValues(e, 'uuid')));
      const known = await this.existingUuids(client, prepared, batch);
      const failure = consistencyFailure(checkConsistency(prepared, { knownUuids: known }));
      if (failure !== null) return err(failure);

      for (const entry of prepared) {
        const uuid = entryFirstValue(entry, 'uuid') ?? '';
        try {
          await client.query(INSERT_SQL, [uuid, JSON.stringify(entryToRecord(entry))]);
        } catch (e) {
          if (isUniqueViolation(e)) {
            return err({ kind: 'ConsistencyError', results: [err<ConsistencyError>({ kind: 'UuidNotUnique', uuid })] });
          }
          throw e;
        }
      }
      return OK_VOID;
    });
  }

  async delete(filter: Filter): Promise<Result<void, OperationError>> {
    return this.setRecycled(filter, true);
  }

  async revive(filter: Filter): Promise<Result<void, OperationError>> {
    return this.setRecycled(filter, false);
  }

  async modify(filter: Filter, modlist: ModifyList, schema?: SchemaValidator): Promise<Result<void, OperationError>> {
    if (modlist.mods.length === 0) return err({ kind: 'EmptyRequest' });
    if (modifiedAttributes(modlist).some((a) => PROTECTED_ATTRIBUTES.includes(a))) {
      return err({ kind: 'SystemProtectedObject' });
    }
    const query = compileSearchQuery(filter, { forUpdate: true });
    if (!query.ok) return query;

    return this.transaction('modify', async (client): Promise<Result<void, OperationError>> => {
      const selected = await client.query<EntryRow>(query.value.sql, query.value.params);
      if (selected.rows.length === 0) return err({ kind: 'NoMatchingEntries' });

      const updated = selected.rows.map((row) => applyModifyList(mapRow(row), modlist));
      for (const entry of updated) {
        const valid = schema?.validate(entry) ?? OK_VOID;
        if (!valid.ok) return err(schemaViolation(valid.error));
      }
      const batch = new Set(updated.flatMap((e) => entryValues(e, 'uuid')));
      const known = await this.existingUuids(client, updated, batch);
      const failure = consistencyFailure(checkConsistency(updated, { knownUuids: known }));
      if (failure !== null) return err(failure);

      for (const entry of updated) {
        const uuid = entryFirstValue(entry, 'uuid') ?? '';
        await client.query(UPDATE_ATTRS_SQL, [uuid, JSON.stringify(entryToRecord(entry))]);
      }
      return OK_VOID;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async search(filter: Filter, recycled: boolean): Promise<Result<Entry[], OperationError>> {
    const query = compileSearchQuery(filter, { recycled });
    if (!query.ok) return query;
    let result: pg.QueryResult<EntryRow>;
    try {
      result = await this.pool.query<EntryRow>(query.value.sql, query.value.params);
    } catch (e) {
      this.onError(e, recycled ? 'evaluateRecycled' : 'evaluate');
      return err({ kind: 'SQLError' });
    }
    return ok(result.rows.map(mapRow));
  }

  private async setRecycled(filter: Filter, recycled: boolean): Promise<Result<void, OperationError>> {
    const predicate = compileFilter(filter, 1);
    if (!predicate.ok) return predicate;
    const sql = [
      'UPDATE entries SET recycled = $1, updated_at = NOW()',
      `WHERE recycled = NOT $1 AND ${predicate.value.sql}`,
    ].join('\n');

    let result: pg.QueryResult;
    try {
      result = await this.pool.query(sql, [recycled, ...predicate.value.params]);
    } catch (e) {
      this.onError(e, recycled ? 'delete' : 'revive');
      return err({ kind: 'SQLError' });
    }
    if (result.rowCount === null || result.rowCount === 0) return err({ kind: 'NoMatchingEntries' });
    return OK_VOID;
  }

  /**
   * Stored uuids among the `member` references of `entries`, excluding the
   * uuids the batch itself carries.
   */
  private async existingUuids(
    client: pg.PoolClient,
    entries: readonly Entry[],
    batch: ReadonlySet<string>,
  ): Promise<Set<string>> {
    const referenced = [...new Set(entries.flatMap((e) => entryValues(e, 'member')))].filter((m) => !batch.has(m));
    if (referenced.length === 0) return new Set();
    const result = await client.query<{ entry_uuid: string }>(EXISTING_UUIDS_SQL, [referenced]);
    return new Set(result.rows.map((r) => r.entry_uuid));
  }

  private async transaction<T>(
    operation: string,
    work: (client: pg.PoolClient) => Promise<Result<T, OperationError>>,
  ): Promise<Result<T, OperationError>> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (e) {
      this.onError(e, operation);
      return err({ kind: 'Backend' });
    }

    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query(result.ok ? 'COMMIT' : 'ROLLBACK');
      return result;
    } catch (e) {
      this.onError(e, operation);
      await client.query('ROLLBACK').catch((rollbackError: unknown) => this.onError(rollbackError, 'rollback'));
      return err({ kind: 'SQLError' });
    } finally {
      client.release();
    }
  }
}
