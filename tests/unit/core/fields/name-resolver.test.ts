/**
 * Tests for field name resolution.
 */
import { describe, it, expect } from 'vitest';
import { resolveFieldName, getTypeName } from '../../../../src/core/fields/name-resolver.js';
import { FieldResolutionError } from '../../../../src/utils/errors.js';
import { field, ident, map, ptr, sel, slice } from '../../../helpers/ast.js';

describe('resolveFieldName', () => {
  it('should use the declared name', () => {
    expect(resolveFieldName(field({ names: ['UserID'], type: ident('int') }))).toBe('UserID');
  });

  it('should use the last name of a multi-name field', () => {
    expect(resolveFieldName(field({ names: ['A', 'B'], type: ident('string') }))).toBe('B');
  });

  it('should skip empty names', () => {
    expect(resolveFieldName(field({ names: ['A', ''], type: ident('string') }))).toBe('A');
  });

  it('should use the type name of an embedded field', () => {
    expect(resolveFieldName(field({ type: ident('Base') }))).toBe('Base');
    expect(resolveFieldName(field({ type: ptr(sel('pkg', 'Thing')) }))).toBe('Thing');
  });

  it('should fail for an embedded field of an unnamed type', () => {
    expect(() => resolveFieldName(field({ type: map(ident('string'), ident('int')) }))).toThrow(
      FieldResolutionError
    );
  });
});

describe('getTypeName', () => {
  it('should describe the unexpected type', () => {
    expect(() => getTypeName(slice(ident('int')))).toThrow('unexpected type slice: []int');
  });

  it('should carry the field name error code', () => {
    try {
      getTypeName(map(ident('string'), ident('int')));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FieldResolutionError);
      if (error instanceof FieldResolutionError) {
        expect(error.code).toBe('T003');
        expect(error.message).toBe('unexpected type map: map[string]int');
      }
    }
  });
});
