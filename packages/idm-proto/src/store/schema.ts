import type pg from 'pg';

export const DDL_CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS entries (
  entry_uuid  TEXT         PRIMARY KEY,
  attrs       JSONB        NOT NULL,
  recycled    BOOLEAN      NOT NULL DEFAULT FALSE,
  updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_GIN_INDEX = `
CREATE INDEX IF NOT EXISTS idx_entries_attrs_gin
  ON entries USING GIN (attrs)
`.trim();

export const DDL_CREATE_RECYCLED_INDEX = `
CREATE INDEX IF NOT EXISTS idx_entries_recycled
  ON entries (recycled, entry_uuid)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TABLE);
  await client.query(DDL_CREATE_GIN_INDEX);
  await client.query(DDL_CREATE_RECYCLED_INDEX);
}
