/**
 * Field type shape tags.
 */

/** Qualifier tags prepended while unwrapping a type expression. */
export const ShapeTags = {
  POINTER: 'pointer',
  ARRAY: 'array',
  SLICE: 'slice',
  MAP: 'map',
} as const;

export type ShapeTag = (typeof ShapeTags)[keyof typeof ShapeTags];

/** Go's predeclared types, classified as themselves. */
export const BASE_TYPES = [
  'bool',
  'string',
  'int',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'uintptr',
  'float32',
  'float64',
  'complex64',
  'complex128',
  'byte',
  'rune',
  'error',
  'any',
] as const;

export type BuiltinType = (typeof BASE_TYPES)[number];

/** Any identifier that is not predeclared (user or package types). */
export type BaseType = BuiltinType | 'named';

export type FieldType = ShapeTag | BaseType;

const BUILTIN_SET: ReadonlySet<string> = new Set(BASE_TYPES);

function isBuiltinType(name: string): name is BuiltinType {
  return BUILTIN_SET.has(name);
}

/**
 * Classify a type identifier's name.
 */
export function parseBaseType(name: string): BaseType {
  return isBuiltinType(name) ? name : 'named';
}
