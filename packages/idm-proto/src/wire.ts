import type { z } from 'zod';
import type { OperationError } from './errors.js';
import type { Result } from './result.js';
import { ok, err } from './result.js';

/** JSON as it travels: every enum variant tagged by name, struct fields by name. */
export type WireValue = string | number | boolean | null | WireValue[] | { [key: string]: WireValue };

/** Deepest object/array nesting in a parsed JSON value, computed without recursion. */
export function jsonDepth(value: unknown): number {
  let deepest = 0;
  const stack: Array<[unknown, number]> = [[value, 0]];
  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [node, depth] = item;
    if (node === null || typeof node !== 'object') continue;
    deepest = Math.max(deepest, depth + 1);
    const next = Array.isArray(node) ? node : Object.values(node);
    for (const child of next) stack.push([child, depth + 1]);
  }
  return deepest;
}

/** Runs a schema and maps any rejection to SerdeJsonError. */
export function decodeWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): Result<z.output<S>, OperationError> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) return err({ kind: 'SerdeJsonError' });
  return ok(parsed.data);
}

/** Parses JSON text, mapping syntax errors to SerdeJsonError. */
export function parseJson(text: string): Result<unknown, OperationError> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch {
    return err({ kind: 'SerdeJsonError' });
  }
}
