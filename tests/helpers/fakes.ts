/**
 * In-process stand-ins for the host collaborators
 */

import type {
  EntityId,
  FieldDefinition,
  FieldTypeTag,
  FieldValue,
  NestedField,
  NestedItem,
} from '../../src/types/audit.js';
import type {
  ActorContext,
  Clock,
  FileResolver,
  NestedItemSource,
  RecordSource,
} from '../../src/types/sources.js';

export interface FakeField {
  definition: FieldDefinition;
  value: FieldValue;
}

export class FakeRecord implements RecordSource {
  readonly entityKind: string;
  readonly entityId: EntityId;
  readonly revisionId: EntityId;
  private fields: Map<string, FakeField>;
  private extraNames: string[];

  constructor(options: {
    entityKind?: string;
    entityId?: EntityId;
    revisionId?: EntityId;
    fields: Record<string, FakeField>;
    /** Names listed by listFieldNames() without a backing field */
    phantomFields?: string[];
  }) {
    this.entityKind = options.entityKind ?? 'node';
    this.entityId = options.entityId ?? 1;
    this.revisionId = options.revisionId ?? 10;
    this.fields = new Map(Object.entries(options.fields));
    this.extraNames = options.phantomFields ?? [];
  }

  getFieldDefinition(name: string): FieldDefinition {
    const field = this.fields.get(name);
    if (!field) throw new Error(`No field ${name}`);
    return field.definition;
  }

  getFieldValue(name: string): FieldValue {
    return this.fields.get(name)?.value ?? [];
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  listFieldNames(): string[] {
    return [...this.fields.keys(), ...this.extraNames];
  }
}

export function field(type: FieldTypeTag, label: string, value: FieldValue): FakeField {
  return { definition: { type, label }, value };
}

export function nestedField(
  name: string,
  type: FieldTypeTag,
  items: FieldValue,
  extra: Partial<FieldDefinition> = {}
): NestedField {
  return { name, definition: { type, label: extra.label ?? name, ...extra }, items };
}

/**
 * Paragraph with `title` (string) sub-field and structural fields
 */
export function paragraph(id: EntityId, title: string, revisionId?: EntityId): NestedItem {
  return {
    id,
    revisionId,
    fields: [
      nestedField('id', 'integer', [{ value: id }], { readOnly: true }),
      nestedField('parent_id', 'string', [{ value: '1' }]),
      nestedField('title', 'string', [{ value: title }], { label: 'Title' }),
    ],
  };
}

export class FakeNestedItemSource implements NestedItemSource {
  byRevision = new Map<string, NestedItem>();
  latest = new Map<string, NestedItem>();
  failingRevisions = new Set<string>();
  failingItems = new Set<string>();

  add(item: NestedItem): this {
    if (item.revisionId !== undefined) {
      this.byRevision.set(String(item.revisionId), item);
    }
    this.latest.set(String(item.id), item);
    return this;
  }

  loadByRevision(revisionId: EntityId): NestedItem | null {
    if (this.failingRevisions.has(String(revisionId))) {
      throw new Error(`revision ${revisionId} unavailable`);
    }
    return this.byRevision.get(String(revisionId)) ?? null;
  }

  loadLatest(id: EntityId): NestedItem | null {
    if (this.failingItems.has(String(id))) {
      throw new Error(`item ${id} unavailable`);
    }
    return this.latest.get(String(id)) ?? null;
  }
}

export class FakeFileResolver implements FileResolver {
  constructor(
    private urls: Record<string, string> = {},
    private failing: Set<string> = new Set()
  ) {}

  resolveUrl(fileId: EntityId): string | null {
    if (this.failing.has(String(fileId))) {
      throw new Error('storage offline');
    }
    return this.urls[String(fileId)] ?? null;
  }
}

export function fixedClock(now: number): Clock {
  return { now: () => now };
}

export function actor(id: EntityId): ActorContext {
  return { currentActorId: () => id };
}
