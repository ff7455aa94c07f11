/**
 * Field Audit
 *
 * Field-level change detection between two revisions of a record, including
 * changes inside nested paragraph items.
 */

export {
  ChangeDetector,
  DEFAULT_EXCLUDED_FIELDS,
  type ChangeDetectorDependencies,
  type ChangeDetectorOptions,
  type LogChangesReport,
} from './core/change-detector.js';
export { computeFieldDiff, isMaterialChange } from './core/field-diff.js';
export {
  FieldStringifier,
  FILE_DELETED,
  FILE_ERROR,
  formatTimestamp,
  type FieldStringifierOptions,
} from './core/field-stringifier.js';
export { NestedItemLoader } from './core/nested-item-loader.js';
export {
  NestedSummaryBuilder,
  DEFAULT_NESTED_EXCLUDED_FIELDS,
  type NestedSummaryBuilderOptions,
} from './core/nested-summary-builder.js';

export * from './types/audit.js';
export * from './types/sources.js';
export * from './types/errors.js';

export { canonicalize, canonicalJson } from './utils/canonicalize.js';
export { normalizeValue, stripMarkup, decodeEntities, collapseWhitespace } from './utils/value-normalizer.js';
export { MemoryLogSink } from './utils/memory-log-sink.js';
export { SqliteLogSink, DEFAULT_AUDIT_TABLE, type SqliteLogSinkConfig } from './utils/sqlite-log-sink.js';
export { Logger, logger, configureLogger, type LogLevel, type LogContext } from './utils/logger.js';
export {
  createFieldAudit,
  type FieldAudit,
  type FieldAuditCollaborators,
  type FieldAuditOptions,
} from './sdk.js';
