/**
 * Registers the built-in source parsers.
 * Import this module to ensure parsers are available before use.
 */
import { parserRegistry } from './parser-registry.js';
import { GoSourceParser } from './go.js';

export function registerBuiltinParsers(): void {
  if (!parserRegistry.isSupported('.go')) {
    parserRegistry.register('go', () => new GoSourceParser(), ['.go']);
  }
}

registerBuiltinParsers();
