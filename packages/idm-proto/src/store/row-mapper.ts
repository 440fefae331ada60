import type { Entry } from '../entry.js';
import { createEntry } from '../entry.js';

export interface EntryRow {
  entry_uuid: string;
  attrs: Record<string, string[]>; // pg auto-parses JSONB
  recycled: boolean;
  updated_at: Date;
}

export function mapRow(row: EntryRow): Entry {
  return createEntry(row.attrs);
}
