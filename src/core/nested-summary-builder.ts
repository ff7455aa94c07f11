/**
 * Nested Summary Builder
 *
 * Flattens a nested item (paragraph) into `sub-field name -> display string`
 * so that two revisions of the same item can be compared field by field.
 * Structural fields (identity, revision, parent linkage, housekeeping) and
 * computed or read-only fields never appear in a summary.
 */

import type { FieldItem, FieldSummary, FieldTypeTag, NestedField, NestedItem } from '../types/audit.js';
import { canonicalJson } from '../utils/canonicalize.js';
import { isFilled, joinSorted, scalarText, targetIdOf } from '../utils/field-items.js';
import { Logger, logger as defaultLoggers } from '../utils/logger.js';
import { collapseWhitespace, decodeEntities } from '../utils/value-normalizer.js';

export const DEFAULT_NESTED_EXCLUDED_FIELDS: readonly string[] = [
  'id',
  'uuid',
  'revision_id',
  'parent_id',
  'parent_type',
  'parent_field_name',
  'default_langcode',
  'behavior_settings',
  'created',
  'langcode',
  'revision_default',
  'status',
];

export interface NestedSummaryBuilderOptions {
  /** Replaces the default exclusion set */
  excludedFields?: readonly string[];
  logger?: Logger;
}

/**
 * Entity-decoded, trimmed, single-spaced text of a text item. Markup is kept.
 */
function cleanText(item: FieldItem): string {
  return collapseWhitespace(decodeEntities(scalarText(item.value)).trim());
}

export class NestedSummaryBuilder {
  private excluded: ReadonlySet<string>;
  private log: Logger;

  constructor(options: NestedSummaryBuilderOptions = {}) {
    this.excluded = new Set(options.excludedFields ?? DEFAULT_NESTED_EXCLUDED_FIELDS);
    this.log = options.logger ?? defaultLoggers.nested;
  }

  /**
   * Summary of every tracked sub-field, sorted by sub-field name.
   * Sub-fields that render to nothing are left out.
   */
  summarize(item: NestedItem): FieldSummary {
    const entries: Array<[string, string]> = [];

    for (const field of this.trackedFields(item)) {
      const values: string[] = [];
      for (const raw of field.items) {
        const rendered = this.renderItem(field.definition.type, raw);
        if (rendered !== null) {
          values.push(rendered);
        }
        this.log.debug(`Field ${field.name} normalized`, {
          itemId: item.id,
          fieldName: field.name,
          value: JSON.stringify(raw),
          normalized: rendered ?? '',
        });
      }

      const joined = joinSorted(values);
      if (joined !== '') {
        entries.push([field.name, joined]);
      }
    }

    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return new Map(entries);
  }

  /**
   * Sub-field name to label, for every tracked sub-field
   */
  labelsOf(item: NestedItem): Map<string, string> {
    return new Map(this.trackedFields(item).map(field => [field.name, field.definition.label]));
  }

  private trackedFields(item: NestedItem): NestedField[] {
    return item.fields.filter(field =>
      !field.definition.computed &&
      !field.definition.readOnly &&
      !this.excluded.has(field.name)
    );
  }

  private renderItem(type: FieldTypeTag, item: FieldItem): string | null {
    switch (type) {
      case 'string':
      case 'text':
      case 'text_long':
      case 'text_with_summary': {
        const text = cleanText(item);
        return text === '' ? null : text;
      }

      case 'boolean':
        return isFilled(item.value) ? 'Yes' : 'No';

      case 'entity_reference':
      case 'nested_composite': {
        const targetId = targetIdOf(item);
        return targetId === undefined ? null : `Entity ID: ${targetId}`;
      }

      default:
        return canonicalJson(item);
    }
  }
}
