/**
 * Configuration loading and conversion to checker settings.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type Rules } from './schema.js';
import { isConvention } from '../conventions/converters.js';
import type { CheckerConfig } from '../checker/types.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, TagCaseError } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.tagcase.yaml';

/**
 * Default configuration values.
 * Used when no config file exists. Rules are empty, so nothing is checked.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults when the default file doesn't exist; an explicitly
 * requested file must exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (error instanceof TagCaseError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Check if a config file exists in the project.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot));
}

/**
 * Parse a `key=convention` command-line rule. An empty convention
 * (`json=`) disables the key.
 */
export function parseRuleOption(option: string): [string, string] {
  const eq = option.indexOf('=');
  const key = eq > 0 ? option.slice(0, eq).trim() : '';
  if (key === '') {
    throw new ConfigError(
      ErrorCodes.INVALID_RULE_OPTION,
      `Invalid rule "${option}": expected <key>=<convention>`,
      { option }
    );
  }

  const convention = option.slice(eq + 1).trim();
  if (convention !== '' && !isConvention(convention)) {
    throw new ConfigError(
      ErrorCodes.INVALID_RULE_OPTION,
      `Invalid rule "${option}": unsupported case: ${convention}`,
      { option, convention }
    );
  }

  return [key, convention];
}

/**
 * Build checker settings. Rules given on the command line replace the
 * configured rules entirely.
 */
export function toCheckerConfig(
  config: Config,
  overrides: { rules?: Rules; useFieldName?: boolean } = {}
): CheckerConfig {
  return {
    rules: overrides.rules ?? config.rules,
    useFieldName: overrides.useFieldName ?? config.use_field_name,
  };
}
