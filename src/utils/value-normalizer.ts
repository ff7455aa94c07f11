/**
 * Value normalization for change detection.
 *
 * Two stored values are considered the same when they normalize to the same
 * string: markup, entity encoding, whitespace runs and JSON key order are
 * all ignored.
 */

import * as cheerio from 'cheerio';
import type { JsonValue } from '../types/audit.js';
import { errorMessage } from '../types/errors.js';
import { canonicalJson } from './canonicalize.js';
import { logger } from './logger.js';

const JSON_OBJECT_SHAPE = /^\{.*\}$/s;

/**
 * Text content of an HTML fragment: entities decoded, tags dropped
 */
function textContent(html: string): string {
  return cheerio.load(html, null, false).root().text();
}

/**
 * Decode HTML entities and keep markup as written
 */
export function decodeEntities(value: string): string {
  if (!value.includes('&')) {
    return value;
  }
  // Escaped `<` come back out of the text node verbatim
  return textContent(value.replace(/</g, '&lt;'));
}

/**
 * Replace every whitespace run with a single space
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}

/**
 * Decode HTML entities and drop markup.
 *
 * Runs twice so that tags which were themselves entity-encoded
 * (`&lt;b&gt;`) are stripped once decoded.
 */
export function stripMarkup(value: string): string {
  if (!value.includes('<') && !value.includes('&')) {
    return value;
  }
  const decoded = textContent(value);
  return decoded.includes('<') ? textContent(decoded) : decoded;
}

function parseJson(value: string): JsonValue | undefined {
  try {
    return JSON.parse(value);
  } catch (error) {
    // Object-shaped but not JSON: compared as plain text
    logger.detector.debug('Value is not valid JSON', {
      code: 'MALFORMED_JSON',
      error: errorMessage(error),
    });
    return undefined;
  }
}

/**
 * Normalize a display string for comparison
 */
export function normalizeValue(value: string): string {
  let normalized = collapseWhitespace(stripMarkup(value).trim());

  if (JSON_OBJECT_SHAPE.test(normalized)) {
    const parsed = parseJson(normalized);
    if (parsed !== undefined) {
      normalized = canonicalJson(parsed);
    }
  }

  return normalized.trim();
}
