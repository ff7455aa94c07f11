import { describe, it, expect } from 'vitest';
import { AuditError, attemptLookup, categoryOf, errorMessage } from '../../src/types/errors.js';

describe('AuditError', () => {
  it('should derive the category from the code', () => {
    const error = new AuditError('FILE_RESOLUTION_FAILED', 'storage offline', { fileId: 5 });

    expect(error.category).toBe('resolution');
    expect(error.name).toBe('AuditError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should flatten into log context', () => {
    const error = new AuditError('SINK_REJECTED', 'Sink rejected entry', { fieldName: 'body' });

    expect(error.toLogContext()).toEqual({
      code: 'SINK_REJECTED',
      category: 'sink',
      error: 'Sink rejected entry',
      fieldName: 'body',
    });
  });

  it('should map every code family to its category', () => {
    expect(categoryOf('MALFORMED_JSON')).toBe('malformed_value');
    expect(categoryOf('FIELD_MISSING')).toBe('contract');
    expect(categoryOf('CONFIG_INVALID')).toBe('config');
    expect(categoryOf('NESTED_ITEM_NOT_FOUND')).toBe('resolution');
  });
});

describe('errorMessage', () => {
  it('should read the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('attemptLookup', () => {
  it('should wrap a value', () => {
    expect(attemptLookup(() => 'https://files.example.com/a.pdf', 'FILE_RESOLUTION_FAILED'))
      .toEqual({ ok: true, value: 'https://files.example.com/a.pdf' });
  });

  it('should treat null as a successful miss', () => {
    expect(attemptLookup(() => null, 'NESTED_ITEM_LOAD_FAILED')).toEqual({ ok: true, value: null });
  });

  it('should capture a thrown error with its cause', () => {
    const cause = new Error('item 3 unavailable');
    const result = attemptLookup(() => {
      throw cause;
    }, 'NESTED_ITEM_LOAD_FAILED', { itemId: 3 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('NESTED_ITEM_LOAD_FAILED');
      expect(result.error.message).toBe('item 3 unavailable');
      expect(result.error.context).toEqual({ itemId: 3 });
      expect(result.error.cause).toBe(cause);
    }
  });
});
