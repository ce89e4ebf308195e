/**
 * Tests for YAML helpers.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, stringifyYaml } from '../../../src/utils/yaml.js';
import { ConfigError, SystemError } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse documents', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('should wrap syntax errors', () => {
    expect(() => parseYaml('a: [1')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should report failing paths', () => {
    expect(() => parseYamlWithSchema('name: demo\ncount: many\n', Schema)).toThrow(ConfigError);
    expect(() => parseYamlWithSchema('name: demo\ncount: many\n', Schema)).toThrow(/^YAML validation failed: count: /);
  });
});

describe('stringifyYaml', () => {
  it('should write block YAML', () => {
    expect(stringifyYaml({ rules: { json: 'camel' }, use_field_name: false })).toBe(
      'rules:\n  json: camel\nuse_field_name: false\n'
    );
  });
});
