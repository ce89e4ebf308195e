/**
 * Registry of source parsers, keyed by file extension.
 */
import type { ISourceParser } from './interface.types.js';

/**
 * Factory function for creating parsers.
 * Used for lazy instantiation.
 */
export type ParserFactory = () => ISourceParser;

interface ParserRegistration {
  factory: ParserFactory;
  extensions: string[];
  instance?: ISourceParser;
}

class ParserRegistry {
  private registrations = new Map<string, ParserRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register a parser.
   *
   * @param id Unique identifier for the parser (e.g., 'go')
   * @param factory Factory function to create the parser
   * @param extensions File extensions the parser handles
   */
  register(id: string, factory: ParserFactory, extensions: string[]): void {
    this.registrations.set(id, { factory, extensions });
    for (const ext of extensions) {
      this.extensionMap.set(ext.toLowerCase(), id);
    }
  }

  /**
   * Get the parser for a file extension, or null if none handles it.
   */
  getForExtension(extension: string): ISourceParser | null {
    const id = this.extensionMap.get(extension.toLowerCase());
    return id ? this.getById(id) : null;
  }

  /**
   * Get a parser by ID, creating the instance lazily.
   */
  getById(id: string): ISourceParser | null {
    const registration = this.registrations.get(id);
    if (!registration) {
      return null;
    }

    if (!registration.instance) {
      registration.instance = registration.factory();
    }

    return registration.instance;
  }

  isSupported(extension: string): boolean {
    return this.extensionMap.has(extension.toLowerCase());
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Dispose all parser instances. Registrations are kept.
   */
  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.disposeAll();
    this.registrations.clear();
    this.extensionMap.clear();
  }
}

export { ParserRegistry };

/**
 * Global parser registry instance.
 */
export const parserRegistry = new ParserRegistry();
