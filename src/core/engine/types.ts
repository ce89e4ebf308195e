/**
 * Lint result types.
 */
import type { SourceLocation } from '../ast/types.js';
import type { Diagnostic } from '../checker/types.js';

export interface FileLintResult {
  /** Path as given to the engine (relative paths stay relative) */
  file: string;
  /** Ordered by line, then column */
  diagnostics: Diagnostic[];
  /** Regions the parser recovered from; structs there may be incomplete */
  parseErrors: SourceLocation[];
  passed: boolean;
}

export interface LintSummary {
  total: number;
  passed: number;
  failed: number;
  diagnostics: number;
}

export interface BatchLintResult {
  results: FileLintResult[];
  summary: LintSummary;
}
