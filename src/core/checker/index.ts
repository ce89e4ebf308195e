export * from './types.js';
export * from './analyzer.js';
export * from './reporter.js';
export * from './struct-walker.js';
export * from './convention-checker.js';
