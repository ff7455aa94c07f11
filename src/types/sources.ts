/**
 * Collaborator interfaces
 *
 * Everything the change detector reads from or writes to lives behind one of
 * these. Implementations belong to the host; the package ships a SQLite and an
 * in-memory LogSink.
 */

import type {
  ChangeEntry,
  EntityId,
  FieldDefinition,
  FieldValue,
  NestedItem,
} from './audit.js';

/**
 * Read-only view of one revision of a record
 */
export interface RecordSource {
  readonly entityKind: string;
  readonly entityId: EntityId;
  readonly revisionId: EntityId;

  getFieldDefinition(name: string): FieldDefinition;
  getFieldValue(name: string): FieldValue;
  hasField(name: string): boolean;
  listFieldNames(): string[];
}

/**
 * Loads nested items. Either method may throw; callers treat that as a
 * resolution failure.
 */
export interface NestedItemSource {
  loadByRevision(revisionId: EntityId): NestedItem | null;
  loadLatest(id: EntityId): NestedItem | null;
}

/**
 * Resolves a stored file id to an absolute URL, or null when the file is gone
 */
export interface FileResolver {
  resolveUrl(fileId: EntityId): string | null;
}

/**
 * Append-only destination for change entries.
 * Returns false (or throws) when the entry could not be stored.
 */
export interface LogSink {
  append(entry: ChangeEntry): boolean;
}

export interface Clock {
  /** Epoch seconds */
  now(): number;
}

export interface ActorContext {
  currentActorId(): EntityId;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
