/**
 * tagcase - struct tag naming convention checker.
 * Main library exports barrel file.
 */

// Syntax tree model
export * from './core/ast/types.js';
export * from './core/ast/format.js';

// Tags, fields and conventions
export * from './core/tags/parser.js';
export * from './core/fields/types.js';
export * from './core/fields/type-classifier.js';
export * from './core/fields/name-resolver.js';
export * from './core/conventions/converters.js';

// Checker
export * from './core/checker/index.js';

// Configuration
export * from './core/config/index.js';

// Engine
export * from './core/engine/index.js';

// Parsers
export * from './validators/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
