import { v4 as uuidv4 } from 'uuid';
import type { Entry } from '../entry.js';
import { compareStrings, createEntry, entryFirstValue, entryValues } from '../entry.js';
import type { Filter } from '../filter/types.js';
import { containsSelf } from '../filter/canonical.js';
import { matchesFilter } from '../filter/evaluate.js';
import type { ModifyList } from '../modify.js';
import { applyModifyList, modifiedAttributes } from '../modify.js';
import type { OperationError } from '../errors.js';
import { consistencyFailure, schemaViolation } from '../errors.js';
import { checkConsistency } from '../schema/consistency.js';
import type { Result } from '../result.js';
import { OK_VOID, err, ok } from '../result.js';
import type { EntryStore, SchemaValidator } from '../types.js';

/** Attributes a modify request may never touch. */
export const PROTECTED_ATTRIBUTES: readonly string[] = ['uuid'];

/** Gives an entry a fresh uuid unless it already carries one. */
export function withUuid(entry: Entry, generate: () => string = uuidv4): Entry {
  if (entry.attrs.has('uuid')) return entry;
  const attrs = new Map<string, readonly string[]>(entry.attrs);
  attrs.set('uuid', [generate()]);
  return createEntry(attrs);
}

function byUuid(a: Entry, b: Entry): number {
  return compareStrings(entryFirstValue(a, 'uuid') ?? '', entryFirstValue(b, 'uuid') ?? '');
}

/**
 * Entry store held in process memory. Deleted entries move to a recycle
 * bin and can be revived. Results come back ordered by uuid.
 */
export class InMemoryEntryStore implements EntryStore {
  private readonly live = new Map<string, Entry>();
  private readonly recycled = new Map<string, Entry>();

  constructor(entries: readonly Entry[] = []) {
    for (const entry of entries) {
      const stored = withUuid(entry);
      this.live.set(entryFirstValue(stored, 'uuid') ?? '', stored);
    }
  }

  async evaluate(filter: Filter): Promise<Result<Entry[], OperationError>> {
    return this.select(this.live, filter);
  }

  async evaluateRecycled(filter: Filter): Promise<Result<Entry[], OperationError>> {
    return this.select(this.recycled, filter);
  }

  async create(entries: readonly Entry[]): Promise<Result<void, OperationError>> {
    if (entries.length === 0) return err({ kind: 'EmptyRequest' });
    const prepared = entries.map((e) => withUuid(e));
    const knownUuids = new Set([...this.live.keys(), ...this.recycled.keys()]);

    const failure = consistencyFailure(checkConsistency(prepared, { knownUuids }));
    if (failure !== null) return err(failure);

    for (const entry of prepared) {
      this.live.set(entryFirstValue(entry, 'uuid') ?? '', entry);
    }
    return OK_VOID;
  }

  async delete(filter: Filter): Promise<Result<void, OperationError>> {
    return this.move(this.live, this.recycled, filter);
  }

  async revive(filter: Filter): Promise<Result<void, OperationError>> {
    return this.move(this.recycled, this.live, filter);
  }

  async modify(filter: Filter, modlist: ModifyList, schema?: SchemaValidator): Promise<Result<void, OperationError>> {
    if (modlist.mods.length === 0) return err({ kind: 'EmptyRequest' });
    if (modifiedAttributes(modlist).some((a) => PROTECTED_ATTRIBUTES.includes(a))) {
      return err({ kind: 'SystemProtectedObject' });
    }

    const matched = this.select(this.live, filter);
    if (!matched.ok) return matched;
    if (matched.value.length === 0) return err({ kind: 'NoMatchingEntries' });

    const updated = new Map(this.live);
    for (const entry of matched.value) {
      const modified = applyModifyList(entry, modlist);
      if (schema !== undefined) {
        const valid = schema.validate(modified);
        if (!valid.ok) return err(schemaViolation(valid.error));
      }
      updated.set(entryFirstValue(entry, 'uuid') ?? '', modified);
    }

    const everything = [...updated.values(), ...this.recycled.values()];
    const failure = consistencyFailure(checkConsistency(everything));
    if (failure !== null) return err(failure);

    for (const [uuid, entry] of updated) this.live.set(uuid, entry);
    return OK_VOID;
  }

  /** Number of live entries. */
  get size(): number {
    return this.live.size;
  }

  private select(source: ReadonlyMap<string, Entry>, filter: Filter): Result<Entry[], OperationError> {
    if (containsSelf(filter)) return err({ kind: 'FilterUUIDResolution' });
    const found = [...source.values()].filter((e) => matchesFilter(e, filter));
    return ok(found.sort(byUuid));
  }

  private move(from: Map<string, Entry>, to: Map<string, Entry>, filter: Filter): Result<void, OperationError> {
    const matched = this.select(from, filter);
    if (!matched.ok) return matched;
    if (matched.value.length === 0) return err({ kind: 'NoMatchingEntries' });
    for (const entry of matched.value) {
      for (const uuid of entryValues(entry, 'uuid')) {
        from.delete(uuid);
        to.set(uuid, entry);
      }
    }
    return OK_VOID;
  }
}
