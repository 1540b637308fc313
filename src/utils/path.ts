import type { FieldValue } from '../types.js';

export type JsonObject = { [key: string]: unknown };
export type PathKey = string | number;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walks `path` from `root`, stopping with `undefined` at the first missing link.
 * String keys descend into objects, numeric keys into arrays.
 */
export function dig(root: unknown, ...path: PathKey[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current) || key < 0 || key >= current.length) {
        return undefined;
      }
      current = current[key];
      continue;
    }
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function digObject(root: unknown, ...path: PathKey[]): JsonObject {
  const found = dig(root, ...path);
  return isObject(found) ? found : {};
}

export function digArray(root: unknown, ...path: PathKey[]): unknown[] {
  const found = dig(root, ...path);
  return Array.isArray(found) ? found : [];
}

/** Scalar at `path`, or null when absent or structured. */
export function digValue(root: unknown, ...path: PathKey[]): FieldValue {
  return toFieldValue(dig(root, ...path));
}

export function toFieldValue(value: unknown): FieldValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return null;
}

/** Value at `path` for every element of `items`, null where absent. */
export function pluck(items: unknown[], ...path: PathKey[]): FieldValue[] {
  return items.map((item) => digValue(item, ...path));
}
