/**
 * Tests for the compact formatter.
 */
import { describe, it, expect } from 'vitest';
import { CompactFormatter } from '../../../../src/cli/formatters/compact.js';
import { batch, passing } from './fixtures.js';

describe('CompactFormatter', () => {
  const formatter = new CompactFormatter();

  it('should write one line per diagnostic and a summary', () => {
    expect(formatter.formatBatch(batch)).toBe(
      "models.go:4:13: json(camel): got 'user_id' want 'userId'\nSUMMARY: 1 issue (2 files checked)"
    );
  });

  it('should write nothing for a passing file', () => {
    expect(formatter.formatResult(passing)).toBe('');
  });

  it('should use singular forms for one file', () => {
    expect(formatter.formatBatch({
      results: [passing],
      summary: { total: 1, passed: 1, failed: 0, diagnostics: 0 },
    })).toBe('SUMMARY: 0 issues (1 file checked)');
  });
});
