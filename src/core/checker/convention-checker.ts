/**
 * Checks one tagged field against one (key, convention) rule.
 */
import type { StructTypeNode, TagLiteral } from '../ast/types.js';
import { lookupTagValue } from '../tags/parser.js';
import { getConverter, type Converter } from '../conventions/converters.js';
import { ConventionError, ErrorCodes } from '../../utils/errors.js';
import type { CheckContext } from './types.js';

/** Tag value that opts a field out of a key's serialization. */
export const SKIP_MARKER = '-';

export interface FieldRuleTarget {
  struct: StructTypeNode;
  tag: TagLiteral;
  fieldName: string;
}

export function checkFieldRule(
  ctx: CheckContext,
  target: FieldRuleTarget,
  key: string,
  convention: string
): void {
  const value = lookupTagValue(target.tag.raw, key);
  if (value === undefined || value === SKIP_MARKER || value === '') {
    return;
  }

  let converter: Converter;
  try {
    converter = getConverter(convention);
  } catch (error) {
    if (!(error instanceof ConventionError)) throw error;
    ctx.reporter.report({
      code: ErrorCodes.UNSUPPORTED_CASE,
      message: `${key}(${convention}): ${error.message}`,
      filePath: ctx.filePath,
      location: target.struct.location,
    });
    return;
  }

  const expected = converter(ctx.config.useFieldName ? target.fieldName : value);
  if (value !== expected) {
    ctx.reporter.report({
      code: ErrorCodes.CASE_MISMATCH,
      message: `${key}(${convention}): got '${value}' want '${expected}'`,
      filePath: ctx.filePath,
      location: target.tag.location,
    });
  }
}
