import { GrammarId, Point, Range } from './entities';

/**
 * The slice of a concrete syntax node the engine reads. Structurally satisfied by
 * web-tree-sitter nodes.
 */
export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: { row: number; column: number };
  readonly endPosition: { row: number; column: number };
  readonly parent: SyntaxNode | null;
  readonly namedChildren: SyntaxNode[];
  childForFieldName(fieldName: string): SyntaxNode | null;
  childrenForFieldName(fieldName: string): SyntaxNode[];
}

export interface FunctionBody {
  /** Body statements in order, comments excluded, the trailing return still included. */
  statements: SyntaxNode[];
  /** The trailing return statement (or tail expression) when the body ends with one. */
  trailingReturn: SyntaxNode | null;
  /** The value expression of the trailing return, if it has one. */
  returnValue: SyntaxNode | null;
}

/** Per-language text templates the inliner fills in. */
export interface SyntaxConventions {
  /** Declares a temporary: `{name}`, `{value}`, and `{declaration}` (the parameter, renamed). */
  temporary: string;
  /** Stands in for a return that does not end the body. `{line}` is 1-based. */
  earlyReturn: string;
}

/**
 * A parsed source file behind grammar-independent queries. Each grammar maps its
 * native node kinds onto these predicates; the reference model, slicer and inliner
 * only ever talk to this interface.
 */
export interface SyntaxTree {
  readonly filename: string;
  readonly content: string;
  readonly grammar: GrammarId;
  readonly root: SyntaxNode;
  readonly conventions: SyntaxConventions;

  isStatement(node: SyntaxNode): boolean;
  isIdentifier(node: SyntaxNode): boolean;
  isCallExpression(node: SyntaxNode): boolean;
  /** A statement holding nothing but an expression, such as `f(x);`. */
  isExpressionStatement(node: SyntaxNode): boolean;
  isReturn(node: SyntaxNode): boolean;
  isLiteral(node: SyntaxNode): boolean;
  /** An identifier naming a member or keyword argument (`p.width`) rather than a variable. */
  isMemberName(identifier: SyntaxNode): boolean;
  isFunctionDefinition(node: SyntaxNode): boolean;
  /** Whether an identifier sits where a name is declared or assigned. */
  isBinding(identifier: SyntaxNode): boolean;

  enclosingStatement(node: SyntaxNode): SyntaxNode | null;
  span(node: SyntaxNode): Range;
  /** The smallest node covering the point. */
  nodeAt(point: Point): SyntaxNode;

  callArguments(call: SyntaxNode): SyntaxNode[];
  parameterNames(fn: SyntaxNode): SyntaxNode[];
  /** The whole parameter a name from `parameterNames` was declared in, e.g. `const char *s`. */
  parameterDeclaration(fn: SyntaxNode, name: SyntaxNode): SyntaxNode;
  functionName(fn: SyntaxNode): string;
  functionBody(fn: SyntaxNode): FunctionBody | null;

  dispose(): void;
}

export function sameNode(a: SyntaxNode, b: SyntaxNode): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}
