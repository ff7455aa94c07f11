/**
 * Canonical form for JSON-like trees.
 *
 * Two trees holding the same data serialize identically once canonicalized:
 * object keys are sorted and empty members are dropped.
 */

import type { JsonValue } from '../types/audit.js';

function isEmpty(value: JsonValue): boolean {
  if (value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * Sort keys and strip `null`, `''`, `[]` and `{}` members, recursively.
 * Emptiness is judged after the member itself has been canonicalized.
 */
export function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(canonicalize).filter(item => !isEmpty(item));
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  const result: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    const member = canonicalize(value[key]);
    if (!isEmpty(member)) {
      // Plain assignment would treat `__proto__` as the prototype
      Object.defineProperty(result, key, {
        value: member,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return result;
}

/**
 * JSON encoding of the canonical form
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(canonicalize(value));
}
