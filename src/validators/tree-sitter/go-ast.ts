/**
 * Go syntax tree extraction using tree-sitter.
 * Maps tree-sitter-go nodes onto the checker's SyntaxTree.
 */

import Parser from 'tree-sitter';
import Go from 'tree-sitter-go';
import type {
  FieldNode,
  IdentifierExpr,
  SourceLocation,
  StructTypeNode,
  SyntaxTree,
  TagLiteral,
  TypeExpr,
} from '../../core/ast/types.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import {
  createContext,
  getNodeText,
  getLocation,
  findNodesOfType,
  findSyntaxErrors,
  type TreeSitterContext,
} from './TreeSitterUtils.js';

// =============================================================================
// Tree-sitter Node Type Constants
// =============================================================================

/** Go tree-sitter node types for type expressions */
const GoTypeNodes = {
  TYPE_IDENTIFIER: 'type_identifier',
  POINTER_TYPE: 'pointer_type',
  ARRAY_TYPE: 'array_type',
  IMPLICIT_LENGTH_ARRAY_TYPE: 'implicit_length_array_type',
  SLICE_TYPE: 'slice_type',
  MAP_TYPE: 'map_type',
  QUALIFIED_TYPE: 'qualified_type',
  STRUCT_TYPE: 'struct_type',
} as const;

/** Go tree-sitter node types for struct members */
const GoMemberNodes = {
  FIELD_DECLARATION_LIST: 'field_declaration_list',
  FIELD_DECLARATION: 'field_declaration',
  FIELD_IDENTIFIER: 'field_identifier',
  RAW_STRING_LITERAL: 'raw_string_literal',
  INTERPRETED_STRING_LITERAL: 'interpreted_string_literal',
  COMMENT: 'comment',
} as const;

/**
 * Nodes between a struct type and a struct type nested in one of its
 * fields. A struct reached only through these is walked from its parent.
 */
const NESTING_NODES: ReadonlySet<string> = new Set([
  GoMemberNodes.FIELD_DECLARATION_LIST,
  GoMemberNodes.FIELD_DECLARATION,
  GoTypeNodes.POINTER_TYPE,
  GoTypeNodes.ARRAY_TYPE,
  GoTypeNodes.IMPLICIT_LENGTH_ARRAY_TYPE,
  GoTypeNodes.SLICE_TYPE,
  GoTypeNodes.MAP_TYPE,
]);

const TAG_NODES: ReadonlySet<string> = new Set([
  GoMemberNodes.RAW_STRING_LITERAL,
  GoMemberNodes.INTERPRETED_STRING_LITERAL,
]);

export interface GoParseResult {
  tree: SyntaxTree;
  /** Locations of regions tree-sitter could not parse */
  syntaxErrors: SourceLocation[];
}

/**
 * Creates a Go parser instance.
 */
export function createGoParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Go);
  return parser;
}

/**
 * Parses Go source and extracts every struct type.
 * tree-sitter recovers from syntax errors, so a partial tree is still
 * returned; the error regions are listed in `syntaxErrors`.
 */
export function extractGoSyntaxTree(
  parser: Parser,
  sourceCode: string,
  filePath: string
): GoParseResult {
  let ctx: TreeSitterContext;
  try {
    ctx = createContext(parser, sourceCode);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  const root = ctx.tree.rootNode;
  const roots = findNodesOfType(root, [GoTypeNodes.STRUCT_TYPE])
    .filter((node) => !isNestedStruct(node))
    .map((node) => toStructType(node, ctx));

  return {
    tree: { filePath, roots },
    syntaxErrors: findSyntaxErrors(root),
  };
}

function isNestedStruct(node: Parser.SyntaxNode): boolean {
  let current = node.parent;
  while (current && NESTING_NODES.has(current.type)) {
    current = current.parent;
  }
  return current?.type === GoTypeNodes.STRUCT_TYPE;
}

function toStructType(node: Parser.SyntaxNode, ctx: TreeSitterContext): StructTypeNode {
  const fieldList = node.namedChildren.find(
    (c) => c.type === GoMemberNodes.FIELD_DECLARATION_LIST
  );
  const fields = fieldList
    ? fieldList.namedChildren
        .filter((c) => c.type === GoMemberNodes.FIELD_DECLARATION)
        .map((c) => toField(c, ctx))
    : [];

  return { kind: 'struct', fields, location: getLocation(node) };
}

function toField(node: Parser.SyntaxNode, ctx: TreeSitterContext): FieldNode {
  const names: IdentifierExpr[] = node.namedChildren
    .filter((c) => c.type === GoMemberNodes.FIELD_IDENTIFIER)
    .map((c) => ({ kind: 'identifier', name: getNodeText(c, ctx.sourceCode), location: getLocation(c) }));

  const tagNode =
    node.childForFieldName('tag') ??
    node.namedChildren.find((c) => TAG_NODES.has(c.type)) ??
    null;
  const tag: TagLiteral | undefined = tagNode
    ? { raw: getNodeText(tagNode, ctx.sourceCode), location: getLocation(tagNode) }
    : undefined;

  const typeNode =
    node.childForFieldName('type') ??
    node.namedChildren.find(
      (c) =>
        c.type !== GoMemberNodes.FIELD_IDENTIFIER &&
        c.type !== GoMemberNodes.COMMENT &&
        c !== tagNode &&
        !TAG_NODES.has(c.type)
    ) ??
    null;

  let type: TypeExpr = typeNode
    ? toTypeExpr(typeNode, ctx)
    : { kind: 'unsupported', nodeType: 'missing', text: '', location: getLocation(node) };

  // Embedded `*T` is a bare '*' token before the type, not a pointer_type
  if (names.length === 0 && node.children.some((c) => c.type === '*')) {
    type = { kind: 'pointer', elem: type, location: getLocation(node) };
  }

  return { names, type, tag, location: getLocation(node) };
}

function toTypeExpr(node: Parser.SyntaxNode, ctx: TreeSitterContext): TypeExpr {
  const location = getLocation(node);

  switch (node.type) {
    case GoTypeNodes.TYPE_IDENTIFIER:
      return { kind: 'identifier', name: getNodeText(node, ctx.sourceCode), location };

    case GoTypeNodes.POINTER_TYPE: {
      const elem = node.namedChildren[0];
      if (elem) return { kind: 'pointer', elem: toTypeExpr(elem, ctx), location };
      break;
    }

    case GoTypeNodes.ARRAY_TYPE: {
      const elem = node.childForFieldName('element');
      const length = node.childForFieldName('length');
      if (elem) {
        return {
          kind: 'array',
          elem: toTypeExpr(elem, ctx),
          length: length ? getNodeText(length, ctx.sourceCode) : undefined,
          location,
        };
      }
      break;
    }

    case GoTypeNodes.IMPLICIT_LENGTH_ARRAY_TYPE: {
      const elem = node.childForFieldName('element');
      if (elem) return { kind: 'array', elem: toTypeExpr(elem, ctx), length: '...', location };
      break;
    }

    case GoTypeNodes.SLICE_TYPE: {
      const elem = node.childForFieldName('element');
      if (elem) return { kind: 'slice', elem: toTypeExpr(elem, ctx), location };
      break;
    }

    case GoTypeNodes.MAP_TYPE: {
      const key = node.childForFieldName('key');
      const value = node.childForFieldName('value');
      if (key && value) {
        return { kind: 'map', key: toTypeExpr(key, ctx), value: toTypeExpr(value, ctx), location };
      }
      break;
    }

    case GoTypeNodes.QUALIFIED_TYPE: {
      const pkg = node.childForFieldName('package');
      const name = node.childForFieldName('name');
      if (pkg && name) {
        return {
          kind: 'selector',
          qualifier: getNodeText(pkg, ctx.sourceCode),
          name: { kind: 'identifier', name: getNodeText(name, ctx.sourceCode), location: getLocation(name) },
          location,
        };
      }
      break;
    }

    case GoTypeNodes.STRUCT_TYPE:
      return toStructType(node, ctx);
  }

  return {
    kind: 'unsupported',
    nodeType: node.type,
    text: getNodeText(node, ctx.sourceCode),
    location,
  };
}
