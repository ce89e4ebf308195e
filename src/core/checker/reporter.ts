/**
 * In-memory diagnostic sink.
 */
import type { SyntaxTree } from '../ast/types.js';
import type { AnalysisPass, Diagnostic, DiagnosticReporter } from './types.js';

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return a.location.line - b.location.line || a.location.column - b.location.column;
}

export class DiagnosticCollector implements DiagnosticReporter {
  private readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  /** Diagnostics in report order. */
  all(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  /** Diagnostics ordered by line, then column. Report order breaks ties. */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort(compareDiagnostics);
  }

  get size(): number {
    return this.diagnostics.length;
  }
}

/**
 * Build an analysis pass that reports into a collector.
 */
export function createPass(filePath: string, tree: SyntaxTree | undefined, collector: DiagnosticCollector): AnalysisPass {
  return {
    filePath,
    tree,
    report: (diagnostic) => collector.report(diagnostic),
  };
}
