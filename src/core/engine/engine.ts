/**
 * Lint engine: parses files and runs the tagcase analyzer over each.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import type { Analyzer, CheckerConfig } from '../checker/types.js';
import { createTagCaseAnalyzer } from '../checker/analyzer.js';
import { DiagnosticCollector, createPass } from '../checker/reporter.js';
import { toCheckerConfig } from '../config/loader.js';
import { parserRegistry } from '../../validators/parser-registry.js';
import '../../validators/register.js';
import { readFile } from '../../utils/file-system.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { BatchLintResult, FileLintResult, LintSummary } from './types.js';

const log = logger.child('engine');

export class LintEngine {
  private readonly projectRoot: string;
  private readonly concurrency: number;
  private readonly analyzer: Analyzer;

  constructor(projectRoot: string, config: Config, checkerConfig?: CheckerConfig) {
    this.projectRoot = projectRoot;
    this.concurrency = config.concurrency;
    this.analyzer = createTagCaseAnalyzer(checkerConfig ?? toCheckerConfig(config));
  }

  /**
   * Lint in-memory source. The file extension selects the parser.
   */
  async lintSource(filePath: string, content: string): Promise<FileLintResult> {
    const parser = parserRegistry.getForExtension(path.extname(filePath));
    if (!parser) {
      log.debug('No parser for file, skipping', { file: filePath });
      return { file: filePath, diagnostics: [], parseErrors: [], passed: true };
    }

    const { tree, syntaxErrors } = await parser.parseFile(filePath, content);
    if (syntaxErrors.length > 0) {
      log.warn('Syntax errors in file; results may be incomplete', {
        file: filePath,
        errors: syntaxErrors.length,
      });
    }

    const collector = new DiagnosticCollector();
    this.analyzer.run(createPass(filePath, tree, collector));
    const diagnostics = collector.sorted();

    return {
      file: filePath,
      diagnostics,
      parseErrors: syntaxErrors,
      passed: diagnostics.length === 0,
    };
  }

  /**
   * Read and lint a file. Relative paths resolve against the project root.
   * A read or parse failure becomes a failed result rather than an exception.
   */
  async lintFile(filePath: string): Promise<FileLintResult> {
    const absolutePath = path.resolve(this.projectRoot, filePath);
    let content: string;
    try {
      content = await readFile(absolutePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.debug('Failed to read file', { file: filePath, error: message });
      return {
        file: filePath,
        diagnostics: [{
          code: ErrorCodes.READ_ERROR,
          message: `unable to read file: ${message}`,
          filePath,
          location: { line: 1, column: 1 },
        }],
        parseErrors: [],
        passed: false,
      };
    }

    let result: FileLintResult;
    try {
      result = await this.lintSource(absolutePath, content);
    } catch (error) {
      if (!(error instanceof SystemError)) {
        throw error;
      }
      log.debug('Failed to parse file', { file: filePath, error: error.message });
      return {
        file: filePath,
        diagnostics: [{
          code: ErrorCodes.PARSE_ERROR,
          message: `unable to parse file: ${error.message}`,
          filePath,
          location: { line: 1, column: 1 },
        }],
        parseErrors: [],
        passed: false,
      };
    }

    return {
      ...result,
      file: filePath,
      diagnostics: result.diagnostics.map((d) => ({ ...d, filePath })),
    };
  }

  /**
   * Lint files with bounded concurrency. Results keep the input order.
   */
  async lintFiles(files: string[]): Promise<BatchLintResult> {
    const results = new Array<FileLintResult>(files.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < files.length) {
        const index = next++;
        results[index] = await this.lintFile(files[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, files.length) }, () => worker());
    await Promise.all(workers);

    return { results, summary: summarize(results) };
  }

  dispose(): void {
    parserRegistry.disposeAll();
  }
}

export function summarize(results: FileLintResult[]): LintSummary {
  const passed = results.filter((r) => r.passed).length;
  return {
    total: results.length,
    passed,
    failed: results.length - passed,
    diagnostics: results.reduce((sum, r) => sum + r.diagnostics.length, 0),
  };
}
