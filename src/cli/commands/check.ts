/**
 * `tagcase check`: lint struct tags in Go files.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, parseRuleOption, toCheckerConfig } from '../../core/config/loader.js';
import type { Config, Rules } from '../../core/config/schema.js';
import { LintEngine } from '../../core/engine/engine.js';
import { createFormatter, isOutputFormat } from '../formatters/index.js';
import { globFiles, isDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { ConfigError, ErrorCodes, TagCaseError } from '../../utils/errors.js';

interface CheckOptions {
  root?: string;
  config?: string;
  rule: string[];
  useFieldName?: boolean;
  format: string;
  quiet?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check struct tag naming conventions')
    .argument('[files...]', 'Files, directories or glob patterns to check')
    .option('--root <dir>', 'Project root (default: current directory)')
    .option('--config <path>', 'Path to config file (default: .tagcase.yaml)')
    .option('--rule <key=convention>', 'Rule to enforce, repeatable; replaces configured rules', collect, [])
    .option('--use-field-name', 'Derive expected tag values from field names')
    .option('--format <format>', 'Output format: human, json, or compact', 'human')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show detailed output')
    .action(async (filePatterns: string[], options: CheckOptions) => {
      if (options.quiet) {
        logger.setLevel('silent');
      } else if (options.verbose) {
        logger.setLevel('debug');
      }

      try {
        process.exitCode = await runCheck(filePatterns, options);
      } catch (error) {
        if (!(error instanceof TagCaseError)) throw error;
        logger.error(error.message);
        process.exitCode = 1;
      }
    });
}

/**
 * Run a check and return the exit code: 0 when every file passed.
 */
export async function runCheck(filePatterns: string[], options: CheckOptions): Promise<number> {
  const projectRoot = path.resolve(options.root ?? process.cwd());

  if (!isOutputFormat(options.format)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Unknown format "${options.format}": expected human, json, or compact`
    );
  }
  const format = options.format;

  const config = await loadConfig(projectRoot, options.config);
  const cliRules: Rules | undefined = options.rule.length > 0
    ? Object.fromEntries(options.rule.map(parseRuleOption))
    : undefined;
  const checkerConfig = toCheckerConfig(config, {
    rules: cliRules,
    useFieldName: options.useFieldName,
  });

  if (Object.keys(checkerConfig.rules).length === 0) {
    logger.warn('No rules configured; nothing will be reported. Run `tagcase init` or pass --rule <key=convention>.');
    return 0;
  }

  const files = await resolveFiles(filePatterns, projectRoot, config);
  if (files.length === 0) {
    logger.warn('No files found matching the given patterns.');
    return 0;
  }

  if (format === 'human') {
    logger.info(`Checking ${files.length} file(s)...`);
  }

  const engine = new LintEngine(projectRoot, config, checkerConfig);
  try {
    const result = await engine.lintFiles(files);
    const formatter = createFormatter(format, { verbose: options.verbose ?? false });
    console.log(formatter.formatBatch(result));
    return result.summary.failed > 0 ? 1 : 0;
  } finally {
    engine.dispose();
  }
}

/**
 * Resolve arguments to project-relative file paths. No arguments means the
 * configured include/exclude globs; a directory means every .go file in it.
 */
async function resolveFiles(patterns: string[], projectRoot: string, config: Config): Promise<string[]> {
  const scan = config.files;
  if (patterns.length === 0) {
    return globFiles(scan.include, { cwd: projectRoot, absolute: false, ignore: scan.exclude });
  }

  const files: string[] = [];
  for (const pattern of patterns) {
    const relative = path.isAbsolute(pattern) ? path.relative(projectRoot, pattern) : pattern;
    if (/[*?[\]{}]/.test(relative)) {
      files.push(...await globFiles(relative, { cwd: projectRoot, absolute: false, ignore: scan.exclude }));
    } else if (await isDirectory(path.resolve(projectRoot, relative))) {
      const dir = relative.split(path.sep).join('/').replace(/\/+$/, '');
      files.push(...await globFiles(`${dir}/**/*.go`, { cwd: projectRoot, absolute: false, ignore: scan.exclude }));
    } else {
      files.push(relative);
    }
  }
  return [...new Set(files)];
}
