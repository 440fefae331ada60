import { describe, it, expect } from 'vitest';
import { createEntry, entryFirstValue, entryToRecord } from '../../src/entry.js';
import { filter, ALWAYS_TRUE } from '../../src/filter/filter-object.js';
import { createModifyList, modify } from '../../src/modify.js';
import { InMemoryEntryStore, withUuid } from '../../src/store/memory-store.js';
import { createSchemaValidator } from '../../src/schema/validator.js';

const OK = { ok: true, value: undefined };

function seed() {
  return new InMemoryEntryStore([
    createEntry({ uuid: ['u2'], class: ['person'], name: ['bob'] }),
    createEntry({ uuid: ['u1'], class: ['person'], name: ['alice'] }),
    createEntry({ uuid: ['g1'], class: ['group'], name: ['admins'], member: ['u1'] }),
  ]);
}

async function names(store: InMemoryEntryStore, recycled = false): Promise<(string | null)[]> {
  const result = recycled ? await store.evaluateRecycled(ALWAYS_TRUE) : await store.evaluate(ALWAYS_TRUE);
  if (!result.ok) throw new Error(result.error.kind);
  return result.value.map((e) => entryFirstValue(e, 'name'));
}

describe('withUuid', () => {
  it('keeps an existing uuid', () => {
    const entry = createEntry({ uuid: ['u1'] });
    expect(withUuid(entry, () => 'fresh')).toBe(entry);
  });

  it('adds a generated uuid', () => {
    const entry = withUuid(createEntry({ name: ['x'] }), () => 'fresh');
    expect(entryToRecord(entry)).toEqual({ name: ['x'], uuid: ['fresh'] });
  });
});

describe('InMemoryEntryStore', () => {
  it('answers in uuid order', async () => {
    expect(await names(seed())).toEqual(['admins', 'alice', 'bob']);
  });

  it('evaluates filters', async () => {
    const result = await seed().evaluate(filter.and(filter.eq('class', 'person'), filter.sub('name', 'li')));
    expect(result.ok && result.value.map((e) => entryToRecord(e))).toEqual([
      { class: ['person'], name: ['alice'], uuid: ['u1'] },
    ]);
  });

  it('refuses filters that still carry self', async () => {
    expect(await seed().evaluate(filter.self())).toEqual({ ok: false, error: { kind: 'FilterUUIDResolution' } });
  });

  describe('create', () => {
    it('rejects an empty batch', async () => {
      expect(await seed().create([])).toEqual({ ok: false, error: { kind: 'EmptyRequest' } });
    });

    it('stores entries and assigns missing uuids', async () => {
      const store = seed();
      expect(await store.create([createEntry({ class: ['person'], name: ['carol'] })])).toEqual(OK);
      expect(store.size).toBe(4);

      const found = await store.evaluate(filter.eq('name', 'carol'));
      expect(found.ok && found.value[0] && entryFirstValue(found.value[0], 'uuid')).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('rejects a uuid that already exists and stores nothing', async () => {
      const store = seed();
      const result = await store.create([createEntry({ uuid: ['u9'], name: ['x'] }), createEntry({ uuid: ['u1'] })]);
      expect(result).toEqual({
        ok: false,
        error: { kind: 'ConsistencyError', results: [OK, { ok: false, error: { kind: 'UuidNotUnique', uuid: 'u1' } }, OK] },
      });
      expect(store.size).toBe(3);
    });

    it('treats recycled uuids as taken', async () => {
      const store = seed();
      await store.delete(filter.eq('uuid', 'u2'));
      const result = await store.create([createEntry({ uuid: ['u2'] })]);
      expect(result.ok).toBe(false);
    });

    it('accepts members that point at stored entries', async () => {
      const store = seed();
      expect(await store.create([createEntry({ uuid: ['g2'], member: ['u2'] })])).toEqual(OK);
      const result = await store.create([createEntry({ uuid: ['g3'], member: ['u404'] })]);
      expect(result).toEqual({
        ok: false,
        error: { kind: 'ConsistencyError', results: [OK, OK, { ok: false, error: { kind: 'RefintNotUpheld', id: 0 } }] },
      });
    });
  });

  describe('delete and revive', () => {
    it('moves entries into the recycle bin and back', async () => {
      const store = seed();
      expect(await store.delete(filter.eq('name', 'bob'))).toEqual(OK);
      expect(await names(store)).toEqual(['admins', 'alice']);
      expect(await names(store, true)).toEqual(['bob']);

      expect(await store.revive(filter.eq('name', 'bob'))).toEqual(OK);
      expect(await names(store)).toEqual(['admins', 'alice', 'bob']);
      expect(await names(store, true)).toEqual([]);
    });

    it('reports when nothing matched', async () => {
      const store = seed();
      expect(await store.delete(filter.eq('name', 'nobody'))).toEqual({
        ok: false,
        error: { kind: 'NoMatchingEntries' },
      });
      expect(await store.revive(filter.eq('name', 'bob'))).toEqual({ ok: false, error: { kind: 'NoMatchingEntries' } });
    });
  });

  describe('modify', () => {
    it('applies the list to every match', async () => {
      const store = seed();
      const mods = createModifyList([modify.present('mail', 'x@example.com'), modify.purged('class')]);
      expect(await store.modify(filter.eq('class', 'person'), mods)).toEqual(OK);

      const result = await store.evaluate(filter.pres('mail'));
      expect(result.ok && result.value.map((e) => entryToRecord(e))).toEqual([
        { mail: ['x@example.com'], name: ['alice'], uuid: ['u1'] },
        { mail: ['x@example.com'], name: ['bob'], uuid: ['u2'] },
      ]);
    });

    it('rejects an empty list', async () => {
      expect(await seed().modify(ALWAYS_TRUE, createModifyList([]))).toEqual({
        ok: false,
        error: { kind: 'EmptyRequest' },
      });
    });

    it('never touches uuid', async () => {
      const mods = createModifyList([modify.purged('uuid')]);
      expect(await seed().modify(ALWAYS_TRUE, mods)).toEqual({ ok: false, error: { kind: 'SystemProtectedObject' } });
    });

    it('reports when nothing matched', async () => {
      const mods = createModifyList([modify.present('mail', 'x')]);
      expect(await seed().modify(filter.eq('name', 'nobody'), mods)).toEqual({
        ok: false,
        error: { kind: 'NoMatchingEntries' },
      });
    });

    it('validates each modified entry against the schema it is given', async () => {
      const store = seed();
      const schema = createSchemaValidator();

      const invalid = await store.modify(
        filter.eq('name', 'alice'),
        createModifyList([modify.present('mail', 'alice@example.com')]),
        schema,
      );
      expect(invalid).toEqual({
        ok: false,
        error: { kind: 'SchemaViolation', error: { kind: 'MissingMustAttribute', attr: 'displayname' } },
      });
      expect(await store.evaluate(filter.pres('mail'))).toEqual({ ok: true, value: [] });

      const valid = await store.modify(
        filter.eq('name', 'alice'),
        createModifyList([modify.present('displayname', 'Alice')]),
        schema,
      );
      expect(valid).toEqual(OK);
      const alice = await store.evaluate(filter.eq('name', 'alice'));
      expect(alice.ok && alice.value[0]?.attrs.get('displayname')).toEqual(['Alice']);
    });

    it('leaves the store unchanged when a reference would dangle', async () => {
      const store = seed();
      const mods = createModifyList([modify.present('member', 'u404')]);
      expect(await store.modify(filter.eq('name', 'admins'), mods)).toEqual({
        ok: false,
        error: { kind: 'ConsistencyError', results: [OK, OK, { ok: false, error: { kind: 'RefintNotUpheld', id: 2 } }] },
      });
      const admins = await store.evaluate(filter.eq('name', 'admins'));
      expect(admins.ok && admins.value[0]?.attrs.get('member')).toEqual(['u1']);
    });
  });
});
