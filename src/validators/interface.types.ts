/**
 * Source parser interface.
 * A parser host turns a source file into the checker's SyntaxTree.
 */
import type { SourceLocation, SyntaxTree } from '../core/ast/types.js';

export interface ParsedSource {
  tree: SyntaxTree;
  /** Regions the parser had to recover from; the tree may be partial there */
  syntaxErrors: SourceLocation[];
}

export interface ISourceParser {
  /** File extensions this parser handles */
  readonly supportedExtensions: string[];

  /**
   * Parse a source file into a SyntaxTree.
   * @param filePath Path to the file
   * @param content Optional pre-loaded content to avoid re-reading from disk
   */
  parseFile(filePath: string, content?: string): Promise<ParsedSource>;

  /**
   * Release resources.
   */
  dispose(): void;
}
