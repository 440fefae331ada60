import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the filter object and builder', async () => {
    const { filter, FilterBuilder } = await import('../../src/index.js');
    expect(typeof filter.eq).toBe('function');
    expect(typeof FilterBuilder).toBe('function');
  });

  it('exports OperationFailure as a class usable with instanceof', async () => {
    const { OperationFailure } = await import('../../src/index.js');
    const failure = new OperationFailure({ kind: 'EmptyRequest' });
    expect(failure).toBeInstanceOf(OperationFailure);
    expect(failure).toBeInstanceOf(Error);
    expect(failure.name).toBe('OperationFailure');
  });

  it('exports the negotiation pieces', async () => {
    const { AuthNegotiator, SessionStore } = await import('../../src/index.js');
    expect(typeof AuthNegotiator).toBe('function');
    expect(typeof SessionStore).toBe('function');
  });

  it('keeps storage behind the store entry point', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['PostgresEntryStore']).toBeUndefined();
    const store = await import('../../src/store/index.js');
    expect(typeof store.PostgresEntryStore).toBe('function');
    expect(typeof store.InMemoryEntryStore).toBe('function');
  });

  it('does NOT export mapRow (internal)', async () => {
    const api = await import('../../src/index.js');
    const store = await import('../../src/store/index.js');
    expect((api as Record<string, unknown>)['mapRow']).toBeUndefined();
    expect((store as Record<string, unknown>)['mapRow']).toBeUndefined();
  });

  it('filter.where builds a filter', async () => {
    const { filter } = await import('../../src/index.js');
    expect(filter.where.attr('name').equals('alice').build()).toEqual({ kind: 'eq', attr: 'name', value: 'alice' });
  });
});
