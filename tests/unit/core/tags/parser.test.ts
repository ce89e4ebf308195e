/**
 * Tests for struct tag parsing and lookup.
 */
import { describe, it, expect } from 'vitest';
import {
  lookupTagValue,
  parseStructTag,
  stripTagQuotes,
  unquoteGoString,
} from '../../../../src/core/tags/parser.js';

describe('stripTagQuotes', () => {
  it('should remove surrounding backticks', () => {
    expect(stripTagQuotes('`json:"id"`')).toBe('json:"id"');
  });

  it('should leave an unquoted tag alone', () => {
    expect(stripTagQuotes('json:"id"')).toBe('json:"id"');
  });
});

describe('unquoteGoString', () => {
  it('should unquote plain strings', () => {
    expect(unquoteGoString('"user_id"')).toBe('user_id');
    expect(unquoteGoString('""')).toBe('');
  });

  it('should decode escapes', () => {
    expect(unquoteGoString('"a\\"b"')).toBe('a"b');
    expect(unquoteGoString('"\\x41\\u00e9\\101"')).toBe('AéA');
    expect(unquoteGoString('"tab\\there"')).toBe('tab\there');
  });

  it('should reject invalid literals', () => {
    expect(unquoteGoString('"\\q"')).toBeUndefined();
    expect(unquoteGoString('"abc')).toBeUndefined();
    expect(unquoteGoString('"\\777"')).toBeUndefined();
    expect(unquoteGoString('abc')).toBeUndefined();
  });
});

describe('parseStructTag', () => {
  it('should return every entry in order', () => {
    expect(parseStructTag('`json:"a,omitempty" xml:"b"`')).toEqual([
      { key: 'json', value: 'a,omitempty' },
      { key: 'xml', value: 'b' },
    ]);
  });

  it('should stop at the first invalid value', () => {
    expect(parseStructTag('`a:"\\q" json:"ok"`')).toEqual([]);
  });

  it('should return nothing for an empty tag', () => {
    expect(parseStructTag('``')).toEqual([]);
  });
});

describe('lookupTagValue', () => {
  it('should return the value for a key', () => {
    expect(lookupTagValue('`json:"user_id"`', 'json')).toBe('user_id');
  });

  it('should return the first comma-separated segment', () => {
    expect(lookupTagValue('`json:"name,omitempty" yaml:"name"`', 'json')).toBe('name');
    expect(lookupTagValue('`json:",omitempty"`', 'json')).toBe('');
  });

  it('should find later keys', () => {
    expect(lookupTagValue('`json:"name,omitempty" yaml:"full_name"`', 'yaml')).toBe('full_name');
  });

  it('should return the skip marker unchanged', () => {
    expect(lookupTagValue('`json:"-"`', 'json')).toBe('-');
  });

  it('should return undefined for an absent key', () => {
    expect(lookupTagValue('`json:"name"`', 'xml')).toBeUndefined();
  });

  it('should read entries without separating spaces', () => {
    expect(lookupTagValue('`json:"x"yaml:"y"`', 'yaml')).toBe('y');
  });

  it('should treat a malformed entry as the end of the tag', () => {
    const tag = '`json:"x" bad yaml:"y"`';
    expect(lookupTagValue(tag, 'json')).toBe('x');
    expect(lookupTagValue(tag, 'yaml')).toBeUndefined();
  });

  it('should treat an unquoted value as absent', () => {
    expect(lookupTagValue('`json:name`', 'json')).toBeUndefined();
  });

  it('should treat an unterminated value as absent', () => {
    expect(lookupTagValue('`json:"abc`', 'json')).toBeUndefined();
  });

  it('should only unquote the entry being read', () => {
    expect(lookupTagValue('`a:"\\q" json:"ok"`', 'json')).toBe('ok');
    expect(lookupTagValue('`a:"\\q" json:"ok"`', 'a')).toBeUndefined();
  });

  it('should decode escapes in the value', () => {
    expect(lookupTagValue('`json:"a\\"b"`', 'json')).toBe('a"b');
  });

  it('should not read a double-quoted tag literal', () => {
    expect(lookupTagValue('"json:\\"x\\""', 'json')).toBeUndefined();
  });
});
