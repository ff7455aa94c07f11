/**
 * Error Taxonomy
 *
 * Failures inside the audit pass are never fatal. They are classified here,
 * logged by the caller, and degrade to a placeholder value or a skipped item.
 */

import type { LogContext } from '../utils/logger.js';

/**
 * High-level error categories
 */
export type ErrorCategory =
  | 'resolution'       // Nested item or file could not be loaded
  | 'malformed_value'  // Value looked structured but did not parse
  | 'contract'         // Collaborator broke its interface promise
  | 'sink'             // Log sink refused or failed an append
  | 'config';          // Configuration file or env var rejected

/**
 * Machine-readable error codes
 */
export type ErrorCode =
  // Resolution errors
  | 'NESTED_REVISION_LOAD_FAILED'
  | 'NESTED_ITEM_LOAD_FAILED'
  | 'NESTED_ITEM_NOT_FOUND'
  | 'FILE_RESOLUTION_FAILED'
  // Malformed values
  | 'MALFORMED_JSON'
  // Contract errors
  | 'FIELD_MISSING'
  // Sink errors
  | 'SINK_APPEND_FAILED'
  | 'SINK_REJECTED'
  // Config errors
  | 'CONFIG_INVALID';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  NESTED_REVISION_LOAD_FAILED: 'resolution',
  NESTED_ITEM_LOAD_FAILED: 'resolution',
  NESTED_ITEM_NOT_FOUND: 'resolution',
  FILE_RESOLUTION_FAILED: 'resolution',
  MALFORMED_JSON: 'malformed_value',
  FIELD_MISSING: 'contract',
  SINK_APPEND_FAILED: 'sink',
  SINK_REJECTED: 'sink',
  CONFIG_INVALID: 'config',
};

/**
 * Context attached to an error for logging
 */
export type ErrorContext = LogContext;

export function categoryOf(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

/**
 * Classified audit error
 */
export class AuditError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuditError';
    this.code = code;
    this.category = categoryOf(code);
    this.context = context;
  }

  /**
   * Flat representation for structured log output
   */
  toLogContext(): LogContext {
    return {
      code: this.code,
      category: this.category,
      error: this.message,
      ...this.context,
    };
  }
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// LOOKUP RESULTS
// ============================================

/**
 * Outcome of a lookup against a collaborator that may throw.
 * A successful lookup can still find nothing (`value: null`).
 */
export type LookupResult<T> =
  | { ok: true; value: T | null }
  | { ok: false; error: AuditError };

/**
 * Run a throwing lookup and capture any failure as a classified error
 */
export function attemptLookup<T>(
  lookup: () => T | null,
  code: ErrorCode,
  context: ErrorContext = {}
): LookupResult<T> {
  try {
    return { ok: true, value: lookup() };
  } catch (error) {
    return {
      ok: false,
      error: new AuditError(code, errorMessage(error), context, { cause: error }),
    };
  }
}
