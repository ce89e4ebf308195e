/**
 * The tagcase analyzer: checks struct tag values against naming conventions.
 */
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { checkStruct, walkStructs } from './struct-walker.js';
import type { Analyzer, AnalysisPass, CheckerConfig, CheckContext } from './types.js';

export const ANALYZER_NAME = 'tagcase';

/**
 * Create an analyzer for a fixed configuration. The rules are copied and
 * frozen so a run cannot observe later changes to the caller's object.
 */
export function createTagCaseAnalyzer(config: CheckerConfig): Analyzer {
  const frozen: CheckerConfig = Object.freeze({
    rules: Object.freeze({ ...config.rules }),
    useFieldName: config.useFieldName,
  });
  const hasRules = Object.keys(frozen.rules).length > 0;

  return {
    name: ANALYZER_NAME,
    doc: 'Checks the struct tags.',
    run(pass: AnalysisPass): void {
      if (!hasRules) {
        return;
      }

      const { tree } = pass;
      if (!tree) {
        throw new SystemError(
          ErrorCodes.MISSING_SYNTAX_TREE,
          `No syntax tree available for ${pass.filePath}`,
          { filePath: pass.filePath }
        );
      }

      const ctx: CheckContext = { config: frozen, filePath: pass.filePath, reporter: pass };
      walkStructs(tree, (node) => checkStruct(ctx, node));
    },
  };
}
