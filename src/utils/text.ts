import type { FieldValue } from '../types.js';

export type JoinOrder = 'sorted' | 'ordered';

export interface JoinPolicy {
  delimiter: string;
  order: JoinOrder;
  trim: boolean;
}

/** XML-sourced columns: trimmed, sorted, `;`-joined. */
export const XML_JOIN: JoinPolicy = { delimiter: ';', order: 'sorted', trim: true };

/** JSON-sourced columns: first occurrence wins, `|`-joined. */
export const JSON_JOIN: JoinPolicy = { delimiter: '|', order: 'ordered', trim: false };

function isBlank(value: FieldValue | undefined): value is null | undefined {
  return value == null || String(value).trim() === '';
}

export function joinUnique(values: Iterable<FieldValue | undefined>, policy: JoinPolicy): string | null {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const value of values) {
    if (isBlank(value)) {
      continue;
    }
    const str = policy.trim ? String(value).trim() : String(value);
    if (seen.has(str)) {
      continue;
    }
    seen.add(str);
    out.push(str);
  }

  if (!out.length) {
    return null;
  }
  if (policy.order === 'sorted') {
    out.sort();
  }
  return out.join(policy.delimiter);
}

export function joinSorted(values: Iterable<FieldValue | undefined>): string | null {
  return joinUnique(values, XML_JOIN);
}

export function joinOrdered(values: Iterable<FieldValue | undefined>): string | null {
  return joinUnique(values, JSON_JOIN);
}
