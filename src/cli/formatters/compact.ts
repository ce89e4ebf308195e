/**
 * Compact output formatter for CI/pre-commit hooks.
 * Provides single-line per issue output for easy parsing.
 */

import type { FileLintResult, BatchLintResult } from '../../core/engine/types.js';
import type { IFormatter } from './types.js';

/**
 * Format: file:line:column: message
 */
export class CompactFormatter implements IFormatter {
  formatResult(result: FileLintResult): string {
    return result.diagnostics
      .map((d) => `${result.file}:${d.location.line}:${d.location.column}: ${d.message}`)
      .join('\n');
  }

  formatBatch(batch: BatchLintResult): string {
    const lines: string[] = [];

    for (const result of batch.results) {
      const formatted = this.formatResult(result);
      if (formatted) {
        lines.push(formatted);
      }
    }

    const { summary } = batch;
    const issues = `${summary.diagnostics} issue${summary.diagnostics !== 1 ? 's' : ''}`;
    const files = `${summary.total} file${summary.total !== 1 ? 's' : ''} checked`;
    lines.push(`SUMMARY: ${issues} (${files})`);

    return lines.join('\n');
  }
}
