/**
 * Tests for diagnostic collection.
 */
import { describe, it, expect } from 'vitest';
import { DiagnosticCollector, compareDiagnostics, createPass } from '../../../../src/core/checker/reporter.js';
import type { Diagnostic } from '../../../../src/core/checker/types.js';
import { at, tree } from '../../../helpers/ast.js';

function diagnostic(message: string, line: number, column: number): Diagnostic {
  return { code: 'T001', message, filePath: 'models.go', location: at(line, column) };
}

describe('DiagnosticCollector', () => {
  it('should keep report order and sort by position', () => {
    const collector = new DiagnosticCollector();
    collector.report(diagnostic('c', 5, 2));
    collector.report(diagnostic('a', 3, 11));
    collector.report(diagnostic('b', 5, 1));
    collector.report(diagnostic('d', 5, 2));

    expect(collector.size).toBe(4);
    expect(collector.all().map((d) => d.message)).toEqual(['c', 'a', 'b', 'd']);
    expect(collector.sorted().map((d) => d.message)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should compare by line, then column', () => {
    expect(compareDiagnostics(diagnostic('x', 1, 9), diagnostic('y', 2, 1))).toBeLessThan(0);
    expect(compareDiagnostics(diagnostic('x', 2, 4), diagnostic('y', 2, 1))).toBeGreaterThan(0);
  });
});

describe('createPass', () => {
  it('should forward reports to the collector', () => {
    const collector = new DiagnosticCollector();
    const pass = createPass('models.go', tree(), collector);
    pass.report(diagnostic('x', 1, 1));

    expect(pass.filePath).toBe('models.go');
    expect(pass.tree?.roots).toEqual([]);
    expect(collector.size).toBe(1);
  });
});
