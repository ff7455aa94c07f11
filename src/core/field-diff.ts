/**
 * Field Diff
 *
 * Decides whether two display strings differ materially and renders the
 * before/after text stored in a change entry. Both sides are normalized
 * first, so cosmetic edits never produce a diff.
 */

import { normalizeValue } from '../utils/value-normalizer.js';

/**
 * Whether two display strings differ once normalized
 */
export function isMaterialChange(original: string, updated: string): boolean {
  return normalizeValue(original) !== normalizeValue(updated);
}

/**
 * Render the change between two values, or null when there is none.
 *
 * @example
 * computeFieldDiff('Hello', 'Hello <b>World</b>');
 * // 'Changed from: Hello\nTo: Hello World'
 */
export function computeFieldDiff(original: string, updated: string): string | null {
  const before = normalizeValue(original);
  const after = normalizeValue(updated);

  if (before === after) {
    return null;
  }

  return `Changed from: ${before}\nTo: ${after}`;
}
