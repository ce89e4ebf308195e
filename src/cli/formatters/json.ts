import type { FileLintResult, BatchLintResult } from '../../core/engine/types.js';
import type { Diagnostic } from '../../core/checker/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatResult(result: FileLintResult): string {
    return JSON.stringify(this.transformResult(result), null, 2);
  }

  formatBatch(batch: BatchLintResult): string {
    return JSON.stringify(
      {
        summary: batch.summary,
        results: batch.results.map((r) => this.transformResult(r)),
      },
      null,
      2
    );
  }

  private transformResult(result: FileLintResult): Record<string, unknown> {
    return {
      file: result.file,
      passed: result.passed,
      parse_errors: result.parseErrors,
      diagnostics: result.diagnostics.map((d) => this.transformDiagnostic(d)),
    };
  }

  private transformDiagnostic(d: Diagnostic): Record<string, unknown> {
    return {
      code: d.code,
      line: d.location.line,
      column: d.location.column,
      message: d.message,
    };
  }
}
