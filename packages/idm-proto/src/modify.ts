import { z } from 'zod';
import type { Entry } from './entry.js';
import { createEntry } from './entry.js';
import type { WireValue } from './wire.js';

export type Modify =
  | { readonly kind: 'present'; readonly attr: string; readonly value: string }
  | { readonly kind: 'removed'; readonly attr: string; readonly value: string }
  | { readonly kind: 'purged'; readonly attr: string };

/** Ordered mutations; later items see the effect of earlier ones. */
export interface ModifyList {
  readonly mods: readonly Modify[];
}

export const modify = {
  present(attr: string, value: string): Modify {
    return { kind: 'present', attr, value };
  },
  removed(attr: string, value: string): Modify {
    return { kind: 'removed', attr, value };
  },
  purged(attr: string): Modify {
    return { kind: 'purged', attr };
  },
};

export function createModifyList(mods: readonly Modify[]): ModifyList {
  return { mods: [...mods] };
}

/** Attributes touched by a list, in first-touched order. */
export function modifiedAttributes(modlist: ModifyList): string[] {
  return [...new Set(modlist.mods.map((m) => m.attr))];
}

/**
 * Applies a modify list to an entry left to right and returns the result.
 * `present` appends a value the attribute does not already hold, `removed`
 * drops every copy of a value and `purged` drops the attribute. An
 * attribute left without values is removed.
 */
export function applyModifyList(entry: Entry, modlist: ModifyList): Entry {
  const attrs = new Map<string, string[]>([...entry.attrs].map(([name, values]) => [name, [...values]]));

  for (const m of modlist.mods) {
    switch (m.kind) {
      case 'present': {
        const values = attrs.get(m.attr) ?? [];
        if (!values.includes(m.value)) attrs.set(m.attr, [...values, m.value]);
        break;
      }
      case 'removed': {
        const remaining = (attrs.get(m.attr) ?? []).filter((v) => v !== m.value);
        if (remaining.length > 0) attrs.set(m.attr, remaining);
        else attrs.delete(m.attr);
        break;
      }
      case 'purged':
        attrs.delete(m.attr);
        break;
    }
  }

  return createEntry(attrs);
}

const pair = z.tuple([z.string(), z.string()]);

export const ModifySchema = z.union([
  z.object({ Present: pair }).strict().transform(({ Present: [attr, value] }) => modify.present(attr, value)),
  z.object({ Removed: pair }).strict().transform(({ Removed: [attr, value] }) => modify.removed(attr, value)),
  z.object({ Purged: z.string() }).strict().transform(({ Purged }) => modify.purged(Purged)),
]);

export const ModifyListSchema = z
  .object({ mods: z.array(ModifySchema) })
  .transform(({ mods }) => createModifyList(mods));

export function encodeModify(m: Modify): WireValue {
  switch (m.kind) {
    case 'present':
      return { Present: [m.attr, m.value] };
    case 'removed':
      return { Removed: [m.attr, m.value] };
    case 'purged':
      return { Purged: m.attr };
  }
}

export function encodeModifyList(modlist: ModifyList): WireValue {
  return { mods: modlist.mods.map(encodeModify) };
}
