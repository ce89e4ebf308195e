/**
 * `tagcase init`: write a starter `.tagcase.yaml`.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { DEFAULT_RULES, type Config } from '../../core/config/schema.js';
import { DEFAULT_CONFIG_PATH, mergeConfig } from '../../core/config/loader.js';
import { fileExists } from '../../utils/file-system.js';
import { writeYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import { TagCaseError } from '../../utils/errors.js';

interface InitOptions {
  root?: string;
  force?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a .tagcase.yaml with the default rules')
    .option('--root <dir>', 'Project root (default: current directory)')
    .option('--force', 'Overwrite an existing configuration')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        if (!(error instanceof TagCaseError)) throw error;
        log.error(error.message);
        process.exitCode = 1;
      }
    });
}

/**
 * Returns the written path, or null when a config already exists.
 */
export async function runInit(options: InitOptions): Promise<string | null> {
  const projectRoot = path.resolve(options.root ?? process.cwd());
  const configPath = path.join(projectRoot, DEFAULT_CONFIG_PATH);

  if (!options.force && (await fileExists(configPath))) {
    log.warn(`${DEFAULT_CONFIG_PATH} already exists. Use --force to overwrite.`);
    return null;
  }

  const config: Config = mergeConfig({ rules: { ...DEFAULT_RULES } });
  await writeYaml(configPath, config);
  log.success(`Created ${DEFAULT_CONFIG_PATH}`);
  return configPath;
}
