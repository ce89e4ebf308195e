/**
 * Host-independent syntax tree consumed by the checker.
 *
 * A parser host (see validators/) maps its own tree onto these types. Only
 * what struct/field discovery needs is modelled: struct types, their fields,
 * and the type expressions a field can declare.
 */

/**
 * Source location (1-based line and column).
 */
export interface SourceLocation {
  line: number;
  column: number;
}

export interface IdentifierExpr {
  kind: 'identifier';
  name: string;
  location: SourceLocation;
}

export interface PointerExpr {
  kind: 'pointer';
  elem: TypeExpr;
  location: SourceLocation;
}

export interface ArrayExpr {
  kind: 'array';
  elem: TypeExpr;
  /** Source text of the length expression, e.g. `4` or `...` */
  length?: string;
  location: SourceLocation;
}

export interface SliceExpr {
  kind: 'slice';
  elem: TypeExpr;
  location: SourceLocation;
}

export interface MapExpr {
  kind: 'map';
  key: TypeExpr;
  value: TypeExpr;
  location: SourceLocation;
}

/**
 * A qualified reference such as `time.Time`.
 */
export interface SelectorExpr {
  kind: 'selector';
  qualifier: string;
  name: IdentifierExpr;
  location: SourceLocation;
}

export interface StructTypeNode {
  kind: 'struct';
  fields: FieldNode[];
  location: SourceLocation;
}

/**
 * Any type expression the checker has no dedicated shape for
 * (channels, functions, interfaces, generics, parenthesized types).
 */
export interface UnsupportedExpr {
  kind: 'unsupported';
  /** Node type reported by the parser host, e.g. `channel_type` */
  nodeType: string;
  /** Source text of the expression */
  text: string;
  location: SourceLocation;
}

export type TypeExpr =
  | IdentifierExpr
  | PointerExpr
  | ArrayExpr
  | SliceExpr
  | MapExpr
  | SelectorExpr
  | StructTypeNode
  | UnsupportedExpr;

/**
 * Raw struct tag literal, delimiting quotes included.
 */
export interface TagLiteral {
  raw: string;
  location: SourceLocation;
}

/**
 * A field declaration. `names` is empty for an embedded field and holds
 * every identifier of a grouped declaration (`A, B int`) in source order.
 */
export interface FieldNode {
  names: IdentifierExpr[];
  type: TypeExpr;
  tag?: TagLiteral;
  location: SourceLocation;
}

export interface SyntaxTree {
  filePath: string;
  /** Outermost struct types; nested ones are reached through field types. */
  roots: StructTypeNode[];
}
