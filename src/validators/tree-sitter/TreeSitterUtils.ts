/**
 * Shared tree-sitter utilities for parser hosts.
 * Provides common traversal, extraction, and context management functions.
 */

import Parser from 'tree-sitter';
import type { SourceLocation } from '../../core/ast/types.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  // the default input buffer rejects sources longer than 32767 characters
  return {
    tree: parser.parse(sourceCode, undefined, { bufferSize: sourceCode.length * 2 + 1 }),
    sourceCode,
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 * Returning false from the callback skips the node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Finds all descendant nodes matching the given types, in pre-order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Collects the ERROR nodes left by tree-sitter's error recovery.
 */
export function findSyntaxErrors(root: Parser.SyntaxNode): SourceLocation[] {
  const errors: SourceLocation[] = [];
  walkTree(root, (node) => {
    if (node.type === 'ERROR') {
      errors.push(getLocation(node));
      return false;
    }
    return true;
  });
  return errors;
}
