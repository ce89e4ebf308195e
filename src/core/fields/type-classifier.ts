/**
 * Classifies a field's declared type into an ordered list of shape tags,
 * outermost qualifier first: `*[]int` → `['pointer', 'slice', 'int']`.
 */
import type { TypeExpr } from '../ast/types.js';
import { ShapeTags, parseBaseType, type FieldType } from './types.js';

/**
 * Returns an empty list when the expression, or anything it wraps, has no
 * supported shape. Callers must treat that as an error.
 */
export function classifyFieldType(expr: TypeExpr): FieldType[] {
  switch (expr.kind) {
    case 'identifier':
      return [parseBaseType(expr.name)];
    case 'pointer':
      return wrap(ShapeTags.POINTER, expr.elem);
    case 'array':
      return wrap(ShapeTags.ARRAY, expr.elem);
    case 'slice':
      return wrap(ShapeTags.SLICE, expr.elem);
    case 'map':
      // Key type is not part of the shape
      return wrap(ShapeTags.MAP, expr.value);
    case 'selector':
      return classifyFieldType(expr.name);
    case 'struct':
    case 'unsupported':
      return [];
  }
}

function wrap(tag: FieldType, inner: TypeExpr): FieldType[] {
  const rest = classifyFieldType(inner);
  return rest.length === 0 ? [] : [tag, ...rest];
}
