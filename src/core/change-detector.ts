/**
 * Change Detector
 *
 * Compares two revisions of a record field by field and produces one change
 * entry per materially changed field:
 * - Simple fields are stringified by type and compared after normalization
 * - Nested-composite fields are matched item by item on item id, and every
 *   changed, deleted or added item becomes a block in a single entry
 * - Housekeeping fields (revision metadata, timestamps, ownership, path)
 *   are never compared
 *
 * @example
 * ```typescript
 * const detector = new ChangeDetector({ nestedItems, files, sink, actor });
 *
 * // Compute entries without writing them
 * const entries = detector.detectChanges(updatedRevision, originalRevision);
 *
 * // Compute and append to the sink
 * const report = detector.logChanges(updatedRevision, originalRevision);
 * ```
 */

import {
  createChangeEntry,
  type ChangeEntry,
  type EntityId,
  type FieldSummary,
  type NestedItemRef,
} from '../types/audit.js';
import {
  systemClock,
  type ActorContext,
  type Clock,
  type FileResolver,
  type LogSink,
  type NestedItemSource,
  type RecordSource,
} from '../types/sources.js';
import { AuditError, errorMessage } from '../types/errors.js';
import { nestedRefOf } from '../utils/field-items.js';
import { Logger, logger as defaultLoggers } from '../utils/logger.js';
import { computeFieldDiff, isMaterialChange } from './field-diff.js';
import { FieldStringifier } from './field-stringifier.js';
import { NestedItemLoader } from './nested-item-loader.js';
import { NestedSummaryBuilder } from './nested-summary-builder.js';

// ============================================
// TYPES
// ============================================

export const DEFAULT_EXCLUDED_FIELDS: readonly string[] = [
  'vid',
  'revision_timestamp',
  'changed',
  'revision_uid',
  'uid',
  'created',
  'path',
  'comment',
  'revision_translation_affected',
];

export interface ChangeDetectorDependencies {
  nestedItems: NestedItemSource;
  files: FileResolver;
  sink: LogSink;
  actor: ActorContext;
  clock?: Clock;

  /** Used by the detector and every component it builds */
  logger?: Logger;
}

export interface ChangeDetectorOptions {
  /** Record fields that are never compared (replaces the defaults) */
  excludedFields?: readonly string[];

  /** Nested sub-fields that never appear in a summary (replaces the defaults) */
  nestedExcludedFields?: readonly string[];
}

/**
 * Outcome of writing a pass to the sink
 */
export interface LogChangesReport {
  entries: ChangeEntry[];
  written: number;
  failed: number;
}

/**
 * Summary of one nested item with the labels of its sub-fields
 */
interface SummarizedItem {
  summary: FieldSummary;
  labels: Map<string, string>;
}

// ============================================
// DETECTOR
// ============================================

export class ChangeDetector {
  private sink: LogSink;
  private actor: ActorContext;
  private clock: Clock;
  private log: Logger;
  private excluded: ReadonlySet<string>;
  private stringifier: FieldStringifier;
  private loader: NestedItemLoader;
  private summaries: NestedSummaryBuilder;

  constructor(deps: ChangeDetectorDependencies, options: ChangeDetectorOptions = {}) {
    this.sink = deps.sink;
    this.actor = deps.actor;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? defaultLoggers.detector;
    this.excluded = new Set(options.excludedFields ?? DEFAULT_EXCLUDED_FIELDS);
    this.stringifier = new FieldStringifier({ files: deps.files, logger: deps.logger });
    this.loader = new NestedItemLoader(deps.nestedItems, deps.logger);
    this.summaries = new NestedSummaryBuilder({
      excludedFields: options.nestedExcludedFields,
      logger: deps.logger,
    });
  }

  /**
   * Change entries between two revisions of the same record
   *
   * @param updated - Revision being saved
   * @param original - Revision it replaces
   */
  detectChanges(updated: RecordSource, original: RecordSource): ChangeEntry[] {
    const entries: ChangeEntry[] = [];
    const actorId = this.actor.currentActorId();
    const log = this.log.child({
      entityKind: updated.entityKind,
      entityId: updated.entityId,
      revisionId: updated.revisionId,
    });

    const fieldNames = updated.listFieldNames().filter(name => !this.excluded.has(name));

    for (const fieldName of fieldNames) {
      if (!updated.hasField(fieldName)) {
        log.debug('Listed field is missing, skipping', { code: 'FIELD_MISSING', fieldName });
        continue;
      }

      const definition = updated.getFieldDefinition(fieldName);
      const diffText = definition.type === 'nested_composite'
        ? this.diffNestedField(updated, original, fieldName)
        : this.diffSimpleField(updated, original, fieldName);

      if (diffText) {
        entries.push(createChangeEntry({
          entityKind: updated.entityKind,
          entityId: updated.entityId,
          revisionId: updated.revisionId,
          fieldLabel: definition.label,
          diffText,
          timestamp: this.clock.now(),
          actorId,
        }));
      }
    }

    log.debug('Change detection finished', {
      fieldsCompared: fieldNames.length,
      changedFields: entries.length,
    });

    return entries;
  }

  /**
   * Detect changes and append each entry to the sink.
   * A failed append is logged and does not stop the others.
   */
  logChanges(updated: RecordSource, original: RecordSource): LogChangesReport {
    const entries = this.detectChanges(updated, original);
    let written = 0;

    for (const entry of entries) {
      if (this.appendEntry(entry)) {
        written++;
      }
    }

    if (entries.length > 0) {
      this.log.info('Logged field changes', {
        entityKind: updated.entityKind,
        entityId: updated.entityId,
        revisionId: updated.revisionId,
        written,
        failed: entries.length - written,
      });
    }

    return { entries, written, failed: entries.length - written };
  }

  private appendEntry(entry: ChangeEntry): boolean {
    const context = {
      entityKind: entry.entityKind,
      entityId: entry.entityId,
      revisionId: entry.revisionId,
      fieldName: entry.fieldLabel,
    };

    try {
      if (this.sink.append(entry)) {
        return true;
      }
      const rejected = new AuditError('SINK_REJECTED', 'Log sink rejected change entry', context);
      this.log.error('Failed to store change entry', rejected.toLogContext());
    } catch (error) {
      const failed = new AuditError('SINK_APPEND_FAILED', errorMessage(error), context, { cause: error });
      this.log.error('Failed to store change entry', { ...failed.toLogContext(), error });
    }
    return false;
  }

  // ============================================
  // SIMPLE FIELDS
  // ============================================

  private diffSimpleField(updated: RecordSource, original: RecordSource, fieldName: string): string | null {
    const before = this.stringifyField(original, fieldName);
    const after = this.stringifyField(updated, fieldName);

    if (!isMaterialChange(before, after)) {
      return null;
    }
    return computeFieldDiff(before, after);
  }

  private stringifyField(record: RecordSource, fieldName: string): string {
    if (!record.hasField(fieldName)) {
      return '';
    }
    const { type } = record.getFieldDefinition(fieldName);
    return this.stringifier.stringify(type, record.getFieldValue(fieldName));
  }

  // ============================================
  // NESTED-COMPOSITE FIELDS
  // ============================================

  private diffNestedField(updated: RecordSource, original: RecordSource, fieldName: string): string | null {
    const before = this.summarizeField(original, fieldName);
    const after = this.summarizeField(updated, fieldName);
    const blocks: string[] = [];

    for (const [id, next] of after) {
      const previous = before.get(id);
      if (previous) {
        blocks.push(...this.changedBlocks(id, previous, next));
      }
    }

    for (const id of before.keys()) {
      if (!after.has(id)) {
        blocks.push(`Paragraph ID ${id}: Deleted`);
      }
    }

    for (const [id, added] of after) {
      if (!before.has(id)) {
        blocks.push(this.addedBlock(id, added));
      }
    }

    return blocks.length > 0 ? blocks.join('\n\n') : null;
  }

  /**
   * Item id to summary, in field order. Items that cannot be loaded are
   * skipped by the loader with a warning.
   */
  private summarizeField(record: RecordSource, fieldName: string): Map<string, SummarizedItem> {
    const result = new Map<string, SummarizedItem>();
    if (!record.hasField(fieldName)) {
      return result;
    }

    const refs = record.getFieldValue(fieldName)
      .map(nestedRefOf)
      .filter((ref): ref is NestedItemRef => ref !== null);

    for (const ref of refs) {
      const item = this.loader.load(ref);
      if (item) {
        result.set(String(ref.id), {
          summary: this.summaries.summarize(item),
          labels: this.summaries.labelsOf(item),
        });
      }
    }
    return result;
  }

  private changedBlocks(id: EntityId, previous: SummarizedItem, next: SummarizedItem): string[] {
    const keys = [...new Set([...previous.summary.keys(), ...next.summary.keys()])].sort();
    const blocks: string[] = [];

    for (const key of keys) {
      const diff = computeFieldDiff(previous.summary.get(key) ?? '', next.summary.get(key) ?? '');
      if (diff) {
        const label = next.labels.get(key) ?? previous.labels.get(key) ?? key;
        blocks.push(`Paragraph ID ${id}, Field ${label}:\n${diff}`);
      }
    }
    return blocks;
  }

  private addedBlock(id: EntityId, item: SummarizedItem): string {
    const lines = [...item.summary].map(([key, value]) => `${item.labels.get(key) ?? key}: ${value}`);
    return [`Paragraph ID ${id}: Added`, ...lines].join('\n');
  }
}
