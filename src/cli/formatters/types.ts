/**
 * Formatter type definitions.
 */
import type { FileLintResult, BatchLintResult } from '../../core/engine/types.js';

export const OUTPUT_FORMATS = ['human', 'json', 'compact'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Show parse error locations */
  verbose: boolean;
  /** Show passing files (default: false - only show files with diagnostics) */
  showPassing: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatResult(result: FileLintResult): string;
  formatBatch(result: BatchLintResult): string;
}
