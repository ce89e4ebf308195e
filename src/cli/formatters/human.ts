import chalk from 'chalk';
import type { FileLintResult, BatchLintResult } from '../../core/engine/types.js';
import type { Diagnostic } from '../../core/checker/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Colour = 'red' | 'green' | 'yellow' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      showPassing: options.showPassing ?? options.verbose ?? false,
    };
  }

  formatResult(result: FileLintResult): string {
    const lines: string[] = [];

    const icon = result.passed ? this.colorize('✓', 'green') : this.colorize('✗', 'red');
    const status = result.passed ? this.colorize('PASS', 'green') : this.colorize('FAIL', 'red');
    lines.push(`${icon} ${status}: ${result.file}`);

    for (const diagnostic of result.diagnostics) {
      lines.push(this.formatDiagnostic(diagnostic));
    }

    if (this.options.verbose && result.parseErrors.length > 0) {
      const at = result.parseErrors.map((l) => `${l.line}:${l.column}`).join(', ');
      lines.push(`   ${this.colorize(`Syntax errors at ${at}`, 'yellow')}`);
    }

    return lines.join('\n');
  }

  formatBatch(batch: BatchLintResult): string {
    const lines: string[] = [];

    for (const result of batch.results) {
      if (!this.options.showPassing && result.passed) {
        continue;
      }
      lines.push(this.formatResult(result));
      lines.push('');
    }

    lines.push(this.formatSummary(batch));
    return lines.join('\n');
  }

  private formatDiagnostic(d: Diagnostic): string {
    const position = `${d.location.line}:${d.location.column}`.padEnd(8);
    return `   ${this.colorize(position, 'dim')}${d.message}  ${this.colorize(`[${d.code}]`, 'dim')}`;
  }

  private formatSummary(batch: BatchLintResult): string {
    const { summary } = batch;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const passedText = this.colorize(`${summary.passed} passed`, 'green');
    const failedText = this.colorize(`${summary.failed} failed`, 'red');
    const diagnosticsText = this.colorize(`${summary.diagnostics} diagnostics`, 'yellow');

    lines.push(`SUMMARY: ${passedText}, ${failedText}, ${diagnosticsText}`);
    lines.push(`Total files: ${summary.total}`);

    return lines.join('\n');
  }

  private colorize(text: string, colour: Colour): string {
    if (!this.options.colors) {
      return text;
    }

    switch (colour) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
