/**
 * Field Audit SDK
 *
 * Wires configuration, logging and a log sink around a ChangeDetector.
 *
 * Usage:
 * ```typescript
 * import { createFieldAudit } from 'field-audit/sdk';
 *
 * const audit = createFieldAudit({ nestedItems, files, actor });
 * audit.detector.logChanges(updatedRevision, originalRevision);
 * audit.close();
 * ```
 */

import {
  ChangeDetector,
  DEFAULT_EXCLUDED_FIELDS,
} from './core/change-detector.js';
import { DEFAULT_NESTED_EXCLUDED_FIELDS } from './core/nested-summary-builder.js';
import type {
  ActorContext,
  Clock,
  FileResolver,
  LogSink,
  NestedItemSource,
} from './types/sources.js';
import {
  getMergedAuditConfig,
  getMergedLogConfig,
  getMergedStorageConfig,
} from './utils/config-loader.js';
import type { StorageConfig } from './utils/config-schemas.js';
import { configureLogger } from './utils/logger.js';
import { SqliteLogSink } from './utils/sqlite-log-sink.js';

export interface FieldAuditCollaborators {
  nestedItems: NestedItemSource;
  files: FileResolver;
  actor: ActorContext;
  clock?: Clock;

  /** Destination for entries; a SQLite sink is opened when omitted */
  sink?: LogSink;
}

export interface FieldAuditOptions {
  /** Extra record fields never compared */
  excludedFields?: string[];

  /** Extra nested sub-fields left out of summaries */
  nestedExcludedFields?: string[];

  /** Overrides for the SQLite sink opened when no sink is given */
  storage?: Partial<StorageConfig>;

  /** Apply the merged log configuration to the shared logger (default: true) */
  configureLogging?: boolean;
}

export interface FieldAudit {
  detector: ChangeDetector;
  sink: LogSink;

  /** Close the sink when it was opened here */
  close(): void;
}

function union(...lists: ReadonlyArray<readonly string[] | undefined>): string[] {
  return [...new Set(lists.flatMap(list => list ?? []))];
}

/**
 * Build a ready-to-use change detector from config file, environment and
 * explicit options.
 */
export function createFieldAudit(
  collaborators: FieldAuditCollaborators,
  options: FieldAuditOptions = {}
): FieldAudit {
  if (options.configureLogging ?? true) {
    configureLogger(getMergedLogConfig());
  }

  const auditConfig = getMergedAuditConfig();

  let ownedSink: SqliteLogSink | null = null;
  let sink = collaborators.sink;
  if (!sink) {
    const storage = { ...getMergedStorageConfig(), ...options.storage };
    ownedSink = new SqliteLogSink({
      dbPath: storage.sqlitePath,
      tableName: storage.tableName,
      walMode: storage.walMode,
    });
    sink = ownedSink;
  }

  const detector = new ChangeDetector(
    {
      nestedItems: collaborators.nestedItems,
      files: collaborators.files,
      actor: collaborators.actor,
      clock: collaborators.clock,
      sink,
    },
    {
      excludedFields: union(DEFAULT_EXCLUDED_FIELDS, auditConfig.excludedFields, options.excludedFields),
      nestedExcludedFields: union(
        DEFAULT_NESTED_EXCLUDED_FIELDS,
        auditConfig.nestedExcludedFields,
        options.nestedExcludedFields
      ),
    }
  );

  return {
    detector,
    sink,
    close: () => ownedSink?.close(),
  };
}
