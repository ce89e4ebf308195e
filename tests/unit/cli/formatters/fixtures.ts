/**
 * Shared lint results for formatter tests.
 */
import type { BatchLintResult, FileLintResult } from '../../../../src/core/engine/types.js';

export const failing: FileLintResult = {
  file: 'models.go',
  diagnostics: [
    {
      code: 'T001',
      message: "json(camel): got 'user_id' want 'userId'",
      filePath: 'models.go',
      location: { line: 4, column: 13 },
    },
  ],
  parseErrors: [{ line: 9, column: 2 }],
  passed: false,
};

export const passing: FileLintResult = {
  file: 'ok.go',
  diagnostics: [],
  parseErrors: [],
  passed: true,
};

export const batch: BatchLintResult = {
  results: [failing, passing],
  summary: { total: 2, passed: 1, failed: 1, diagnostics: 1 },
};
