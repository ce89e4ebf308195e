/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  configExists,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  parseRuleOption,
  toCheckerConfig,
} from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tagcase-config-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', async () => {
    const config = await loadConfig(root);
    expect(config).toEqual(getDefaultConfig());
    expect(await configExists(root)).toBe(false);
  });

  it('should load .tagcase.yaml from the project root', async () => {
    await fs.writeFile(
      path.join(root, '.tagcase.yaml'),
      'rules:\n  json: snake\n  yaml: goCamel\nuse_field_name: true\n'
    );

    const config = await loadConfig(root);
    expect(config.rules).toEqual({ json: 'snake', yaml: 'goCamel' });
    expect(config.use_field_name).toBe(true);
    expect(await configExists(root)).toBe(true);
  });

  it('should load an empty file as defaults', async () => {
    await fs.writeFile(path.join(root, '.tagcase.yaml'), '');
    expect(await loadConfig(root)).toEqual(getDefaultConfig());
  });

  it('should load an explicit config path relative to the root', async () => {
    await fs.writeFile(path.join(root, 'lint.yaml'), 'rules:\n  json: kebab\n');
    const config = await loadConfig(root, 'lint.yaml');
    expect(config.rules).toEqual({ json: 'kebab' });
  });

  it('should fail when an explicit config file is missing', async () => {
    await expect(loadConfig(root, 'missing.yaml')).rejects.toThrow(
      `Config file not found: ${path.join(root, 'missing.yaml')}`
    );
  });

  it('should reject unknown conventions', async () => {
    await fs.writeFile(path.join(root, '.tagcase.yaml'), 'rules:\n  xml: bogus\n');
    const error = await loadConfig(root).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.code).toBe('C002');
      expect(error.message).toContain('unsupported case: bogus');
      expect(error.message).toContain(`(file: ${getConfigPath(root)})`);
    }
  });

  it('should wrap YAML syntax errors as load errors', async () => {
    await fs.writeFile(path.join(root, '.tagcase.yaml'), 'rules: [unclosed\n');
    const error = await loadConfig(root).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.code).toBe('C001');
      expect(error.message.startsWith(`Failed to load config from ${getConfigPath(root)}: `)).toBe(true);
    }
  });
});

describe('parseRuleOption', () => {
  it('should split key and convention', () => {
    expect(parseRuleOption('json=snake')).toEqual(['json', 'snake']);
    expect(parseRuleOption(' yaml = goKebab ')).toEqual(['yaml', 'goKebab']);
  });

  it('should allow an empty convention', () => {
    expect(parseRuleOption('json=')).toEqual(['json', '']);
  });

  it('should reject options without a key', () => {
    expect(() => parseRuleOption('snake')).toThrow('Invalid rule "snake": expected <key>=<convention>');
    expect(() => parseRuleOption('=snake')).toThrow('Invalid rule "=snake": expected <key>=<convention>');
  });

  it('should reject unknown conventions', () => {
    expect(() => parseRuleOption('json=bogus')).toThrow('Invalid rule "json=bogus": unsupported case: bogus');
  });
});

describe('toCheckerConfig', () => {
  it('should use the configured rules by default', () => {
    const config = { ...getDefaultConfig(), rules: { json: 'camel' }, use_field_name: true };
    expect(toCheckerConfig(config)).toEqual({ rules: { json: 'camel' }, useFieldName: true });
  });

  it('should replace the rules with overrides', () => {
    const config = { ...getDefaultConfig(), rules: { json: 'camel', xml: 'snake' } };
    expect(toCheckerConfig(config, { rules: { yaml: 'kebab' }, useFieldName: true })).toEqual({
      rules: { yaml: 'kebab' },
      useFieldName: true,
    });
  });
});
