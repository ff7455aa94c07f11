/**
 * Configuration Schemas
 *
 * Zod schemas for every configuration section. Values arrive as strings
 * (environment variables, or file values converted to env format) and are
 * parsed into typed configs here.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Parses 'true', '1', 'yes' as true and any other value as false.
 * A missing value takes the given default.
 */
export function booleanStringSchema(defaultValue = false) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Comma-separated list of strings, blanks dropped.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

/**
 * SQL identifier usable as a table name.
 */
export const tableNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'Must be a plain SQL identifier' });

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// AUDIT CONFIGURATION
// ============================================

export const auditConfigSchema = z.object({
  /** Extra record fields never compared, on top of the built-in set */
  excludedFields: commaSeparatedListSchema.optional(),

  /** Extra nested sub-fields left out of summaries */
  nestedExcludedFields: commaSeparatedListSchema.optional(),
});

export type AuditConfig = z.infer<typeof auditConfigSchema>;

// ============================================
// STORAGE CONFIGURATION
// ============================================

export const storageConfigSchema = z.object({
  sqlitePath: z.string().default('./data/field-audit.db'),
  tableName: tableNameSchema.default('field_change_audit_log'),
  walMode: booleanStringSchema(true),
});

export type StorageConfig = z.infer<typeof storageConfigSchema>;
