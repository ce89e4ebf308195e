/**
 * Resolves the name a field is known by for tag purposes.
 */
import type { FieldNode, TypeExpr } from '../ast/types.js';
import { unexpectedTypeMessage } from '../ast/format.js';
import { FieldResolutionError, ErrorCodes } from '../../utils/errors.js';

/**
 * The last non-empty declared identifier wins (`A, B int` resolves to `B`).
 * Embedded fields fall back to the name of their type.
 *
 * @throws FieldResolutionError for an embedded field whose type is not an
 * identifier, pointer or qualified reference
 */
export function resolveFieldName(field: FieldNode): string {
  let name = '';
  for (const ident of field.names) {
    if (ident.name !== '') {
      name = ident.name;
    }
  }

  if (name !== '') {
    return name;
  }

  return getTypeName(field.type);
}

export function getTypeName(expr: TypeExpr): string {
  switch (expr.kind) {
    case 'identifier':
      return expr.name;
    case 'pointer':
      return getTypeName(expr.elem);
    case 'selector':
      return getTypeName(expr.name);
    default:
      throw new FieldResolutionError(ErrorCodes.FIELD_NAME, unexpectedTypeMessage(expr), {
        kind: expr.kind,
        location: expr.location,
      });
  }
}
