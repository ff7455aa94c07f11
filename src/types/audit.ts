/**
 * Audit data model
 *
 * Types shared by the stringifier, the nested summary builder and the
 * change detector. Raw values are read-only snapshots handed in by the
 * host entity system.
 */

// ============================================
// RAW VALUES
// ============================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * One stored item of a field, e.g. `{ value: 'Hello' }` or
 * `{ target_id: 12, target_revision_id: 40 }`
 */
export type FieldItem = JsonObject;

/**
 * Ordered list of items for one field on one revision
 */
export type FieldValue = readonly FieldItem[];

/**
 * Identifier of an entity, a revision or a user as the host stores it
 */
export type EntityId = string | number;

// ============================================
// FIELD TYPES
// ============================================

/**
 * Every field type the stringifier knows how to render.
 * Unknown host types fall back to `other`.
 */
export const FIELD_TYPE_TAGS = [
  'string',
  'text',
  'text_long',
  'text_with_summary',
  'boolean',
  'integer',
  'timestamp',
  'decimal',
  'float',
  'date',
  'link',
  'file',
  'image',
  'comment',
  'entity_reference',
  'nested_composite',
  'other',
] as const;

export type FieldTypeTag = (typeof FIELD_TYPE_TAGS)[number];

/**
 * Target kind that turns a revision reference into a nested composite
 */
export const NESTED_TARGET_KIND = 'paragraph';


/**
 * Map a host field type string onto a FieldTypeTag.
 *
 * Revision references to paragraphs become `nested_composite`; other entity
 * references collapse to `entity_reference`.
 */
export function toFieldTypeTag(hostType: string, targetKind?: string): FieldTypeTag {
  if (hostType === 'entity_reference' || hostType === 'entity_reference_revisions') {
    return targetKind === NESTED_TARGET_KIND ? 'nested_composite' : 'entity_reference';
  }
  return FIELD_TYPE_TAGS.find(tag => tag === hostType) ?? 'other';
}

/**
 * Definition of a field as exposed by the host
 */
export interface FieldDefinition {
  type: FieldTypeTag;

  /** Human-readable label used in change entries */
  label: string;

  /** Kind of entity a reference field points to */
  targetKind?: string;

  /** Value is derived, never stored */
  computed?: boolean;

  /** Value cannot be edited */
  readOnly?: boolean;
}

// ============================================
// NESTED ITEMS
// ============================================

/**
 * Reference to a nested item from a nested-composite field
 */
export interface NestedItemRef {
  id: EntityId;
  revisionId?: EntityId;
}

export interface NestedField {
  name: string;
  definition: FieldDefinition;
  items: FieldValue;
}

/**
 * A composite sub-record (paragraph) loaded at a specific revision
 */
export interface NestedItem {
  id: EntityId;
  revisionId?: EntityId;
  fields: readonly NestedField[];
}

/**
 * Sub-field name to display string, in ascending name order
 */
export type FieldSummary = ReadonlyMap<string, string>;

// ============================================
// CHANGE ENTRIES
// ============================================

/**
 * One changed field on one revision, as handed to the log sink
 */
export interface ChangeEntry {
  readonly entityKind: string;
  readonly entityId: EntityId;
  readonly revisionId: EntityId;
  readonly fieldLabel: string;
  readonly diffText: string;
  /** Epoch seconds */
  readonly timestamp: number;
  readonly actorId: EntityId;
}

export function createChangeEntry(entry: ChangeEntry): ChangeEntry {
  return Object.freeze({
    entityKind: entry.entityKind,
    entityId: entry.entityId,
    revisionId: entry.revisionId,
    fieldLabel: entry.fieldLabel,
    diffText: entry.diffText,
    timestamp: entry.timestamp,
    actorId: entry.actorId,
  });
}
