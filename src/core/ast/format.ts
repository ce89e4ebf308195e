/**
 * Render type expressions back to Go-like source text for messages.
 */
import type { FieldNode, TypeExpr } from './types.js';

export function formatTypeExpr(expr: TypeExpr): string {
  switch (expr.kind) {
    case 'identifier':
      return expr.name;
    case 'pointer':
      return `*${formatTypeExpr(expr.elem)}`;
    case 'array':
      return `[${expr.length ?? ''}]${formatTypeExpr(expr.elem)}`;
    case 'slice':
      return `[]${formatTypeExpr(expr.elem)}`;
    case 'map':
      return `map[${formatTypeExpr(expr.key)}]${formatTypeExpr(expr.value)}`;
    case 'selector':
      return `${expr.qualifier}.${expr.name.name}`;
    case 'struct':
      return expr.fields.length === 0
        ? 'struct{}'
        : `struct{ ${expr.fields.map(formatField).join('; ')} }`;
    case 'unsupported':
      return expr.text;
  }
}

function formatField(field: FieldNode): string {
  const parts: string[] = [];
  if (field.names.length > 0) {
    parts.push(field.names.map((n) => n.name).join(', '));
  }
  parts.push(formatTypeExpr(field.type));
  if (field.tag) {
    parts.push(field.tag.raw);
  }
  return parts.join(' ');
}

/**
 * Label used in "unexpected type" messages: the host's node type for
 * unsupported expressions, the union kind otherwise.
 */
export function describeTypeExpr(expr: TypeExpr): string {
  return expr.kind === 'unsupported' ? expr.nodeType : expr.kind;
}

/**
 * Detail string shared by field name and field type errors.
 */
export function unexpectedTypeMessage(expr: TypeExpr): string {
  return `unexpected type ${describeTypeExpr(expr)}: ${formatTypeExpr(expr)}`;
}
