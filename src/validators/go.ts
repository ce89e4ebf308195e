/**
 * Go source parser backed by tree-sitter.
 */
import type Parser from 'tree-sitter';
import type { ISourceParser, ParsedSource } from './interface.types.js';
import { createGoParser, extractGoSyntaxTree } from './tree-sitter/go-ast.js';
import { readFile } from '../utils/file-system.js';

export class GoSourceParser implements ISourceParser {
  readonly supportedExtensions = ['.go'];

  private parser: Parser | null = null;

  async parseFile(filePath: string, content?: string): Promise<ParsedSource> {
    const source = content ?? await readFile(filePath);
    return extractGoSyntaxTree(this.getParser(), source, filePath);
  }

  dispose(): void {
    this.parser = null;
  }

  /** The native parser is created on first use. */
  private getParser(): Parser {
    if (!this.parser) {
      this.parser = createGoParser();
    }
    return this.parser;
  }
}
