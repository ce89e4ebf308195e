/**
 * Source parser exports barrel file.
 */

export * from './interface.types.js';
export * from './parser-registry.js';
export * from './go.js';
export { createGoParser, extractGoSyntaxTree, type GoParseResult } from './tree-sitter/go-ast.js';

// Registration (ensures parsers are registered when barrel is imported)
export { registerBuiltinParsers } from './register.js';
