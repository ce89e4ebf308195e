/**
 * Naming convention identifiers and their converters.
 */
import {
  toCamel,
  toPascal,
  toKebab,
  toSnake,
  toGoCamel,
  toGoPascal,
  toGoKebab,
  toGoSnake,
} from '../../utils/strcase.js';
import { ConventionError, ErrorCodes } from '../../utils/errors.js';

export const CONVENTIONS = [
  'camel',
  'pascal',
  'kebab',
  'snake',
  'goCamel',
  'goPascal',
  'goKebab',
  'goSnake',
  'upper',
  'lower',
] as const;

export type Convention = (typeof CONVENTIONS)[number];

export type Converter = (input: string) => string;

const CONVERTERS: Readonly<Record<Convention, Converter>> = Object.freeze({
  camel: toCamel,
  pascal: toPascal,
  kebab: toKebab,
  snake: toSnake,
  goCamel: toGoCamel,
  goPascal: toGoPascal,
  goKebab: toGoKebab,
  goSnake: toGoSnake,
  upper: (s: string) => s.toUpperCase(),
  lower: (s: string) => s.toLowerCase(),
});

export function isConvention(value: string): value is Convention {
  return Object.prototype.hasOwnProperty.call(CONVERTERS, value);
}

/**
 * @throws ConventionError when the identifier is not a known convention
 */
export function getConverter(convention: string): Converter {
  if (!isConvention(convention)) {
    throw new ConventionError(ErrorCodes.UNSUPPORTED_CASE, `unsupported case: ${convention}`, {
      convention,
    });
  }
  return CONVERTERS[convention];
}
