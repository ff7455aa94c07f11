/**
 * Loads nested items for a nested-composite field.
 *
 * The exact revision referenced by the field is preferred; when it cannot be
 * loaded the latest revision of the item is used instead. Failures are logged
 * and surface as null.
 */

import type { NestedItem, NestedItemRef } from '../types/audit.js';
import type { NestedItemSource } from '../types/sources.js';
import { attemptLookup } from '../types/errors.js';
import { Logger, logger as defaultLoggers } from '../utils/logger.js';

export class NestedItemLoader {
  private source: NestedItemSource;
  private log: Logger;

  constructor(source: NestedItemSource, log: Logger = defaultLoggers.nested) {
    this.source = source;
    this.log = log;
  }

  load(ref: NestedItemRef): NestedItem | null {
    const { id, revisionId } = ref;

    if (revisionId !== undefined) {
      const byRevision = attemptLookup(
        () => this.source.loadByRevision(revisionId),
        'NESTED_REVISION_LOAD_FAILED',
        { itemId: id, revisionId }
      );
      if (!byRevision.ok) {
        this.log.warn(`Failed to load paragraph revision ${revisionId}`, byRevision.error.toLogContext());
      } else if (byRevision.value) {
        return byRevision.value;
      }
    }

    const latest = attemptLookup(
      () => this.source.loadLatest(id),
      'NESTED_ITEM_LOAD_FAILED',
      { itemId: id }
    );
    if (!latest.ok) {
      this.log.warn(`Failed to load paragraph ${id}`, latest.error.toLogContext());
      return null;
    }

    if (!latest.value) {
      this.log.warn(`Paragraph ${id} not found, skipping`, {
        code: 'NESTED_ITEM_NOT_FOUND',
        itemId: id,
        revisionId,
      });
    }
    return latest.value;
  }
}
