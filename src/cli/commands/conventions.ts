/**
 * `tagcase conventions`: list the supported convention identifiers.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { CONVENTIONS, getConverter } from '../../core/conventions/converters.js';

const DEFAULT_SAMPLE = 'UserID';

export function createConventionsCommand(): Command {
  return new Command('conventions')
    .description('List supported naming conventions')
    .option('--sample <name>', 'Name to convert in the examples', DEFAULT_SAMPLE)
    .action((options: { sample: string }) => {
      console.log(formatConventions(options.sample));
    });
}

export function formatConventions(sample: string = DEFAULT_SAMPLE): string {
  const width = Math.max(...CONVENTIONS.map((c) => c.length));
  return CONVENTIONS
    .map((c) => `  ${chalk.bold(c.padEnd(width))}  ${sample} → ${getConverter(c)(sample)}`)
    .join('\n');
}
