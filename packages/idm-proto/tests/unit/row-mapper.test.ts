import { describe, it, expect } from 'vitest';
import { mapRow, type EntryRow } from '../../src/store/row-mapper.js';
import { entryToRecord } from '../../src/entry.js';

const baseRow: EntryRow = {
  entry_uuid: 'u1',
  attrs: { uuid: ['u1'], name: ['alice'], class: ['person', 'account'] },
  recycled: false,
  updated_at: new Date('2024-01-01T00:00:00.000Z'),
};

describe('mapRow', () => {
  it('orders attribute names and keeps value order', () => {
    const entry = mapRow(baseRow);
    expect([...entry.attrs.keys()]).toEqual(['class', 'name', 'uuid']);
    expect(entry.attrs.get('class')).toEqual(['person', 'account']);
  });

  it('ignores the bookkeeping columns', () => {
    expect(entryToRecord(mapRow({ ...baseRow, recycled: true }))).toEqual(entryToRecord(mapRow(baseRow)));
  });

  it('does not share arrays with the row', () => {
    const row: EntryRow = { ...baseRow, attrs: { name: ['alice'] } };
    const entry = mapRow(row);
    row.attrs['name']?.push('mallory');
    expect(entry.attrs.get('name')).toEqual(['alice']);
  });
});
