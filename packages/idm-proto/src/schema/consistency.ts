import type { Entry } from '../entry.js';
import { entryValues } from '../entry.js';
import type { ConsistencyResult } from '../errors.js';
import { OK_VOID, err } from '../result.js';

export interface ConsistencyOptions {
  /** UUIDs known to exist outside `entries`, e.g. rows already stored. */
  knownUuids?: ReadonlySet<string>;
}

/** Every entry carries exactly one uuid. */
function checkUuidPresent(entries: readonly Entry[]): ConsistencyResult {
  const index = entries.findIndex((e) => entryValues(e, 'uuid').length !== 1);
  return index === -1 ? OK_VOID : err({ kind: 'EntryUuidCorrupt', id: index });
}

function checkUuidUnique(entries: readonly Entry[], known: ReadonlySet<string>): ConsistencyResult {
  const seen = new Set<string>();
  for (const entry of entries) {
    for (const uuid of entryValues(entry, 'uuid')) {
      if (seen.has(uuid) || known.has(uuid)) return err({ kind: 'UuidNotUnique', uuid });
      seen.add(uuid);
    }
  }
  return OK_VOID;
}

/** Each `member` value names an entry that exists. */
function checkMemberRefint(entries: readonly Entry[], known: ReadonlySet<string>): ConsistencyResult {
  const uuids = new Set(entries.flatMap((e) => entryValues(e, 'uuid')));
  const index = entries.findIndex((e) =>
    entryValues(e, 'member').some((m) => !uuids.has(m) && !known.has(m)),
  );
  return index === -1 ? OK_VOID : err({ kind: 'RefintNotUpheld', id: index });
}

/**
 * Runs the structural checks over a set of entries and returns one result
 * per check, in a fixed order. Ids in errors are indexes into `entries`.
 */
export function checkConsistency(entries: readonly Entry[], options: ConsistencyOptions = {}): ConsistencyResult[] {
  const known = options.knownUuids ?? new Set<string>();
  return [checkUuidPresent(entries), checkUuidUnique(entries, known), checkMemberRefint(entries, known)];
}
