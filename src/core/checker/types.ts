/**
 * Checker configuration, diagnostics, and the analysis pass contract.
 */
import type { SourceLocation, SyntaxTree } from '../ast/types.js';
import type { ErrorCode } from '../../utils/errors.js';

export interface CheckerConfig {
  /** Tag key → convention identifier. An empty identifier disables the key. */
  readonly rules: Readonly<Record<string, string>>;
  /** Derive the expected tag value from the field name instead of the tag itself */
  readonly useFieldName: boolean;
}

export interface Diagnostic {
  code: ErrorCode;
  message: string;
  filePath: string;
  location: SourceLocation;
}

export interface DiagnosticReporter {
  report(diagnostic: Diagnostic): void;
}

/**
 * One file's worth of input to the analyzer.
 */
export interface AnalysisPass extends DiagnosticReporter {
  readonly filePath: string;
  /** Parsed tree; absent when the host could not provide one */
  readonly tree?: SyntaxTree;
}

/**
 * What the per-field checks need: where to report and what to enforce.
 */
export interface CheckContext {
  config: CheckerConfig;
  filePath: string;
  reporter: DiagnosticReporter;
}

export interface Analyzer {
  readonly name: string;
  readonly doc: string;
  run(pass: AnalysisPass): void;
}
