/**
 * Field Stringifier
 *
 * Renders all items of one field as a single display string. Each item is
 * rendered by its type tag, then the renderings are sorted and joined, so
 * reordering a multi-value field is never reported as a change.
 *
 * @example
 * ```typescript
 * const stringifier = new FieldStringifier({ files });
 *
 * stringifier.stringify('boolean', [{ value: 1 }]);        // 'Yes'
 * stringifier.stringify('link', [{ uri: 'https://example.com', title: 'Home' }]);
 * // 'https://example.com (Home)'
 * ```
 */

import type { EntityId, FieldItem, FieldTypeTag, FieldValue } from '../types/audit.js';
import type { FileResolver } from '../types/sources.js';
import { attemptLookup } from '../types/errors.js';
import { canonicalJson } from '../utils/canonicalize.js';
import {
  isFilled,
  joinSorted,
  scalarText,
  targetIdOf,
  toDecimal,
  toInteger,
} from '../utils/field-items.js';
import { Logger, logger as defaultLoggers } from '../utils/logger.js';

export const FILE_DELETED = 'File (deleted)';
export const FILE_ERROR = 'File (error)';

export interface FieldStringifierOptions {
  files: FileResolver;
  logger?: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time for an epoch-seconds value.
 * Values outside the Date range render as the plain integer.
 */
export function formatTimestamp(epochSeconds: number): string {
  const date = new Date(epochSeconds * 1000);
  if (Number.isNaN(date.getTime())) {
    return String(epochSeconds);
  }
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export class FieldStringifier {
  private files: FileResolver;
  private log: Logger;

  constructor(options: FieldStringifierOptions) {
    this.files = options.files;
    this.log = options.logger ?? defaultLoggers.stringifier;
  }

  /**
   * Display string for every item of a field
   */
  stringify(type: FieldTypeTag, items: FieldValue): string {
    const output: string[] = [];
    for (const item of items) {
      const rendered = this.stringifyItem(type, item);
      if (rendered !== null) {
        output.push(rendered);
      }
    }
    return joinSorted(output);
  }

  /**
   * Display string for one item, or null when the item renders nothing
   */
  stringifyItem(type: FieldTypeTag, item: FieldItem): string | null {
    switch (type) {
      case 'string':
      case 'text':
      case 'text_long':
      case 'text_with_summary':
        return scalarText(item.value).trim();

      case 'boolean':
        return isFilled(item.value) ? 'Yes' : 'No';

      case 'integer':
      case 'timestamp':
        return formatTimestamp(toInteger(item.value));

      case 'decimal':
      case 'float':
        return toDecimal(item.value).toFixed(2);

      case 'date':
        return scalarText(item.value);

      case 'link':
        return `${scalarText(item.uri)} (${scalarText(item.title)})`;

      case 'comment':
        return item.status === undefined || item.status === null ? '0' : scalarText(item.status);

      case 'file':
      case 'image': {
        const fileId = targetIdOf(item);
        return fileId === undefined ? null : this.describeFile(fileId);
      }

      case 'nested_composite':
        return `Paragraph ID: ${scalarText(item.target_id)}`;

      case 'entity_reference':
      case 'other':
        return canonicalJson(item);

      default: {
        const unhandled: never = type;
        return canonicalJson({ type: String(unhandled), ...item });
      }
    }
  }

  private describeFile(fileId: EntityId): string {
    const lookup = attemptLookup(
      () => this.files.resolveUrl(fileId),
      'FILE_RESOLUTION_FAILED',
      { itemId: fileId }
    );

    if (!lookup.ok) {
      this.log.warn(`Failed to load file ${fileId}`, lookup.error.toLogContext());
      return FILE_ERROR;
    }

    return lookup.value ?? FILE_DELETED;
  }
}
