/**
 * Struct discovery and per-field dispatch.
 */
import type { FieldNode, StructTypeNode, SyntaxTree, TypeExpr } from '../ast/types.js';
import { unexpectedTypeMessage } from '../ast/format.js';
import { resolveFieldName } from '../fields/name-resolver.js';
import { classifyFieldType } from '../fields/type-classifier.js';
import { ErrorCodes, FieldResolutionError } from '../../utils/errors.js';
import { checkFieldRule } from './convention-checker.js';
import type { CheckContext } from './types.js';

/**
 * Visit every struct type in pre-order: a struct before the struct types
 * nested in its fields, fields in source order.
 */
export function walkStructs(tree: SyntaxTree, visit: (node: StructTypeNode) => void): void {
  for (const root of tree.roots) {
    walkTypeExpr(root, visit);
  }
}

function walkTypeExpr(expr: TypeExpr, visit: (node: StructTypeNode) => void): void {
  switch (expr.kind) {
    case 'struct':
      visit(expr);
      for (const field of expr.fields) {
        walkTypeExpr(field.type, visit);
      }
      return;
    case 'pointer':
    case 'array':
    case 'slice':
      walkTypeExpr(expr.elem, visit);
      return;
    case 'map':
      walkTypeExpr(expr.key, visit);
      walkTypeExpr(expr.value, visit);
      return;
    default:
      return;
  }
}

export function checkStruct(ctx: CheckContext, struct: StructTypeNode): void {
  if (struct.fields.length < 1) {
    return;
  }

  for (const field of struct.fields) {
    checkField(ctx, struct, field);
  }
}

function checkField(ctx: CheckContext, struct: StructTypeNode, field: FieldNode): void {
  const { tag } = field;
  if (!tag) {
    return;
  }

  let fieldName: string;
  try {
    fieldName = resolveFieldName(field);
  } catch (error) {
    if (!(error instanceof FieldResolutionError)) throw error;
    ctx.reporter.report({
      code: ErrorCodes.FIELD_NAME,
      message: `unable to get field name: ${error.message}`,
      filePath: ctx.filePath,
      location: struct.location,
    });
    return;
  }

  // The shape is not used by the rules yet, but an unclassifiable type is
  // still reported.
  if (classifyFieldType(field.type).length < 1) {
    ctx.reporter.report({
      code: ErrorCodes.FIELD_TYPE,
      message: `unable to get field type: ${unexpectedTypeMessage(field.type)}`,
      filePath: ctx.filePath,
      location: struct.location,
    });
    return;
  }

  for (const [key, convention] of Object.entries(ctx.config.rules)) {
    if (convention === '') {
      continue;
    }
    checkFieldRule(ctx, { struct, tag, fieldName }, key, convention);
  }
}
