import { describe, it, expect } from 'vitest';
import { createEntry, entryToRecord, encodeEntry, EntrySchema } from '../../src/entry.js';
import {
  applyModifyList,
  createModifyList,
  encodeModifyList,
  modifiedAttributes,
  modify,
  ModifyListSchema,
} from '../../src/modify.js';

const base = createEntry({ name: ['alice'], mail: ['alice@example.com'] });

describe('applyModifyList', () => {
  it('a later purge wins over an earlier present', () => {
    const result = applyModifyList(base, createModifyList([modify.present('mail', 'a@x'), modify.purged('mail')]));
    expect(result.attrs.has('mail')).toBe(false);
    expect(entryToRecord(result)).toEqual({ name: ['alice'] });
  });

  it('present appends a new value once', () => {
    const result = applyModifyList(
      base,
      createModifyList([modify.present('mail', 'a@x'), modify.present('mail', 'a@x')]),
    );
    expect(result.attrs.get('mail')).toEqual(['alice@example.com', 'a@x']);
  });

  it('present creates a missing attribute, keeping attribute order sorted', () => {
    const result = applyModifyList(base, createModifyList([modify.present('displayname', 'Alice')]));
    expect([...result.attrs.keys()]).toEqual(['displayname', 'mail', 'name']);
  });

  it('removed drops a single value and the attribute once empty', () => {
    const two = createEntry({ mail: ['a', 'b'] });
    expect(applyModifyList(two, createModifyList([modify.removed('mail', 'a')])).attrs.get('mail')).toEqual(['b']);
    expect(
      applyModifyList(two, createModifyList([modify.removed('mail', 'a'), modify.removed('mail', 'b')])).attrs.has('mail'),
    ).toBe(false);
  });

  it('removing an absent value is a no-op', () => {
    expect(applyModifyList(base, createModifyList([modify.removed('mail', 'nope')]))).toEqual(base);
  });

  it('leaves the input entry untouched', () => {
    applyModifyList(base, createModifyList([modify.purged('name')]));
    expect(entryToRecord(base)).toEqual({ mail: ['alice@example.com'], name: ['alice'] });
  });
});

describe('modifiedAttributes', () => {
  it('lists touched attributes once, first-touched first', () => {
    const list = createModifyList([modify.purged('b'), modify.present('a', '1'), modify.removed('b', '2')]);
    expect(modifiedAttributes(list)).toEqual(['b', 'a']);
  });
});

describe('wire form', () => {
  it('encodes mods as tagged variants in order', () => {
    const list = createModifyList([modify.present('mail', 'a@x'), modify.removed('mail', 'b'), modify.purged('mail')]);
    expect(encodeModifyList(list)).toEqual({
      mods: [{ Present: ['mail', 'a@x'] }, { Removed: ['mail', 'b'] }, { Purged: 'mail' }],
    });
    expect(ModifyListSchema.parse(encodeModifyList(list))).toEqual(list);
  });

  it('rejects an unknown mod', () => {
    expect(ModifyListSchema.safeParse({ mods: [{ Replace: ['a', 'b'] }] }).success).toBe(false);
  });

  it('entries encode as an attrs object', () => {
    expect(encodeEntry(base)).toEqual({ attrs: { mail: ['alice@example.com'], name: ['alice'] } });
    expect(EntrySchema.parse({ attrs: { name: ['alice'], mail: ['alice@example.com'] } })).toEqual(base);
    expect(EntrySchema.safeParse({ attrs: { name: 'alice' } }).success).toBe(false);
  });
});
