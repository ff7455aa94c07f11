/**
 * Tests for nested item summaries
 */

import { describe, it, expect } from 'vitest';
import { NestedSummaryBuilder } from '../../src/core/nested-summary-builder.js';
import type { NestedItem } from '../../src/types/audit.js';
import { nestedField } from '../helpers/fakes.js';

const item: NestedItem = {
  id: 12,
  revisionId: 120,
  fields: [
    nestedField('uuid', 'string', [{ value: 'b3c1' }]),
    nestedField('revision_id', 'integer', [{ value: 120 }]),
    nestedField('parent_type', 'string', [{ value: 'node' }]),
    nestedField('status', 'boolean', [{ value: 1 }]),
    nestedField('type', 'entity_reference', [{ target_id: 'text_block' }], { readOnly: true }),
    nestedField('search_index', 'string', [{ value: 'derived' }], { computed: true }),
    nestedField('title', 'string', [{ value: '  Opening &amp;   Welcome ' }], { label: 'Title' }),
    nestedField('body', 'text_long', [{ value: '<p>First</p>', format: 'basic_html' }], { label: 'Body' }),
    nestedField('featured', 'boolean', [{ value: 0 }], { label: 'Featured' }),
    nestedField('tags', 'entity_reference', [{ target_id: 9 }, { target_id: 4 }, { target_id: null }], {
      label: 'Tags',
    }),
    nestedField('link', 'link', [{ uri: 'https://example.com', title: '', options: [] }], { label: 'Link' }),
    nestedField('subtitle', 'string', [{ value: '   ' }], { label: 'Subtitle' }),
  ],
};

describe('NestedSummaryBuilder', () => {
  it('should summarize tracked sub-fields sorted by name', () => {
    const summary = new NestedSummaryBuilder().summarize(item);

    expect([...summary.entries()]).toEqual([
      ['body', '<p>First</p>'],
      ['featured', 'No'],
      ['link', '{"uri":"https://example.com"}'],
      ['tags', 'Entity ID: 4, Entity ID: 9'],
      ['title', 'Opening & Welcome'],
    ]);
  });

  it('should leave out structural, computed and read-only fields', () => {
    const summary = new NestedSummaryBuilder().summarize(item);

    for (const name of ['uuid', 'revision_id', 'parent_type', 'status', 'type', 'search_index']) {
      expect(summary.has(name)).toBe(false);
    }
  });

  it('should decode entities and keep markup in text', () => {
    const linked: NestedItem = {
      id: 13,
      fields: [
        nestedField('body', 'text_long', [{ value: '<p>See <a href="https://docs.example.com">docs</a> &amp;\n more</p>' }]),
      ],
    };

    expect([...new NestedSummaryBuilder().summarize(linked)]).toEqual([
      ['body', '<p>See <a href="https://docs.example.com">docs</a> & more</p>'],
    ]);
  });

  it('should leave out sub-fields that render empty', () => {
    expect(new NestedSummaryBuilder().summarize(item).has('subtitle')).toBe(false);
  });

  it('should honour a custom exclusion set', () => {
    const builder = new NestedSummaryBuilder({ excludedFields: ['body', 'link'] });
    const summary = builder.summarize(item);

    expect(summary.has('body')).toBe(false);
    expect(summary.has('link')).toBe(false);
    expect(summary.get('status')).toBe('Yes');
  });

  it('should expose labels of tracked sub-fields', () => {
    const labels = new NestedSummaryBuilder().labelsOf(item);

    expect(labels.get('title')).toBe('Title');
    expect(labels.has('uuid')).toBe(false);
  });
});
