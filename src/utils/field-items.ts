/**
 * Readers for raw field items. Stored items are loosely typed, so every
 * property read goes through one of these.
 */

import type { EntityId, FieldItem, JsonValue, NestedItemRef } from '../types/audit.js';

/**
 * Text of a scalar property; objects, arrays and null read as ''
 */
export function scalarText(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Loose truthiness of a stored property: null, false, 0, '', '0', [] and {}
 * count as empty.
 */
export function isFilled(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (value === 0 || value === '' || value === '0') return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

/**
 * Integer reading of a stored property; unparsable input reads as 0
 */
export function toInteger(value: JsonValue | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Float reading of a stored property; unparsable input reads as 0
 */
export function toDecimal(value: JsonValue | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value.trim());
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

function toEntityId(value: JsonValue | undefined): EntityId | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value !== '') return value;
  return undefined;
}

/**
 * `target_id` of a reference item, when it holds one
 */
export function targetIdOf(item: FieldItem): EntityId | undefined {
  return isFilled(item.target_id) ? toEntityId(item.target_id) : undefined;
}

/**
 * Nested item reference held by a nested-composite item
 */
export function nestedRefOf(item: FieldItem): NestedItemRef | null {
  const id = targetIdOf(item);
  if (id === undefined) return null;

  const revisionId = isFilled(item.target_revision_id)
    ? toEntityId(item.target_revision_id)
    : undefined;

  return revisionId === undefined ? { id } : { id, revisionId };
}

/**
 * Sort lexicographically, drop empty strings, join with ', '
 */
export function joinSorted(values: readonly string[]): string {
  return [...values].sort().filter(value => value !== '').join(', ');
}
