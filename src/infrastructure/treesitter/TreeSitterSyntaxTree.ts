import Parser from 'web-tree-sitter';
import { GrammarId, Point, Range } from '../../domain/entities';
import {
  FunctionBody,
  SyntaxConventions,
  SyntaxNode,
  SyntaxTree,
  sameNode,
} from '../../domain/SyntaxTree';
import { GrammarCapabilities } from './GrammarRegistry';

export class TreeSitterSyntaxTree implements SyntaxTree {
  readonly root: SyntaxNode;
  readonly conventions: SyntaxConventions;

  private readonly identifiers: Set<string>;
  private readonly statements: Set<string>;
  private readonly expressionStatements: Set<string>;
  private readonly blocks: Set<string>;
  private readonly calls: Set<string>;
  private readonly functions: Set<string>;
  private readonly returns: Set<string>;
  private readonly literals: Set<string>;
  private readonly comments: Set<string>;
  private readonly bindingFields = new Map<string, string[]>();
  private readonly memberFields = new Map<string, string[]>();

  constructor(
    private readonly tree: Parser.Tree,
    readonly filename: string,
    readonly content: string,
    readonly grammar: GrammarId,
    private readonly capabilities: GrammarCapabilities,
  ) {
    this.root = tree.rootNode;
    this.conventions = {
      temporary: capabilities.temporary,
      earlyReturn: capabilities.earlyReturn,
    };
    this.identifiers = new Set(capabilities.identifiers);
    this.statements = new Set(capabilities.statements);
    this.expressionStatements = new Set(capabilities.expressionStatements);
    this.blocks = new Set(capabilities.blocks);
    this.calls = new Set(capabilities.calls);
    this.functions = new Set(capabilities.functions);
    this.returns = new Set(capabilities.returns);
    this.literals = new Set(capabilities.literals);
    this.comments = new Set(capabilities.comments);
    for (const { kind, field } of capabilities.bindings) {
      this.bindingFields.set(kind, [...(this.bindingFields.get(kind) ?? []), field]);
    }
    for (const { kind, field } of capabilities.members) {
      this.memberFields.set(kind, [...(this.memberFields.get(kind) ?? []), field]);
    }
  }

  isStatement(node: SyntaxNode): boolean {
    return this.statements.has(node.type);
  }

  isIdentifier(node: SyntaxNode): boolean {
    return this.identifiers.has(node.type);
  }

  isCallExpression(node: SyntaxNode): boolean {
    return this.calls.has(node.type);
  }

  isExpressionStatement(node: SyntaxNode): boolean {
    return this.expressionStatements.has(node.type);
  }

  isReturn(node: SyntaxNode): boolean {
    return this.returns.has(node.type);
  }

  isLiteral(node: SyntaxNode): boolean {
    return this.literals.has(node.type);
  }

  isMemberName(identifier: SyntaxNode): boolean {
    const parent = identifier.parent;
    const fields = parent ? this.memberFields.get(parent.type) : undefined;
    if (!parent || !fields) {
      return false;
    }
    return fields.some((field) => {
      const child = parent.childForFieldName(field);
      return child !== null && sameNode(child, identifier);
    });
  }

  isFunctionDefinition(node: SyntaxNode): boolean {
    return this.functions.has(node.type);
  }

  hasSyntaxErrors(): boolean {
    return this.tree.rootNode.descendantsOfType('ERROR').length > 0;
  }

  /**
   * Walks up from the identifier to its statement. The first ancestor with binding
   * fields decides: the identifier binds when it lies under one of those fields.
   */
  isBinding(identifier: SyntaxNode): boolean {
    const statement = this.enclosingStatement(identifier);
    let child = identifier;
    let parent = identifier.parent;
    while (parent) {
      const fields = this.bindingFields.get(parent.type);
      if (fields) {
        const owner = parent;
        return fields.some((field) =>
          owner.childrenForFieldName(field).some((node) => sameNode(node, child)),
        );
      }
      if (statement && sameNode(parent, statement)) {
        return false;
      }
      child = parent;
      parent = parent.parent;
    }
    return false;
  }

  enclosingStatement(node: SyntaxNode): SyntaxNode | null {
    let current: SyntaxNode | null = node;
    while (current) {
      if (this.isStatement(current)) {
        return current;
      }
      current = current.parent;
    }
    return null;
  }

  span(node: SyntaxNode): Range {
    return {
      start: { line: node.startPosition.row, col: node.startPosition.column },
      end: { line: node.endPosition.row, col: node.endPosition.column },
    };
  }

  nodeAt(point: Point): SyntaxNode {
    return this.tree.rootNode.descendantForPosition({ row: point.line, column: point.col });
  }

  callArguments(call: SyntaxNode): SyntaxNode[] {
    const args = call.childForFieldName('arguments');
    return args ? args.namedChildren.filter((node) => !this.isComment(node)) : [];
  }

  parameterNames(fn: SyntaxNode): SyntaxNode[] {
    // `x => x + 1` has a single parameter and no list.
    const single = fn.childForFieldName('parameter');
    const params = single ? [single] : (this.parameterList(fn)?.namedChildren ?? []);
    return params
      .filter((param) => !this.isComment(param))
      .flatMap((param) => this.parameterIdentifiers(param));
  }

  parameterDeclaration(fn: SyntaxNode, name: SyntaxNode): SyntaxNode {
    const single = fn.childForFieldName('parameter');
    const list = single ? null : this.parameterList(fn);
    let current = name;
    while (current.parent && !(list && sameNode(current.parent, list))) {
      if (single && sameNode(current, single)) {
        break;
      }
      current = current.parent;
    }
    return current;
  }

  functionName(fn: SyntaxNode): string {
    const name = fn.childForFieldName('name');
    if (name) {
      return name.text;
    }
    let declarator = fn.childForFieldName('declarator');
    while (declarator) {
      if (declarator.type.endsWith('identifier')) {
        return declarator.text;
      }
      declarator = declarator.childForFieldName('declarator');
    }
    const variable = fn.parent?.childForFieldName('name');
    return variable ? variable.text : '<anonymous>';
  }

  functionBody(fn: SyntaxNode): FunctionBody | null {
    const body = fn.childForFieldName('body');
    if (!body) {
      return null;
    }
    if (!this.blocks.has(body.type)) {
      return { statements: [], trailingReturn: null, returnValue: body };
    }

    let statements = body.namedChildren.filter((node) => !this.isComment(node));
    while (statements.length === 1 && this.blocks.has(statements[0].type)) {
      statements = statements[0].namedChildren.filter((node) => !this.isComment(node));
    }

    const last = statements.length > 0 ? statements[statements.length - 1] : null;
    if (!last) {
      return { statements, trailingReturn: null, returnValue: null };
    }
    const returnNode = this.asReturn(last);
    if (returnNode) {
      const value = returnNode.namedChildren.find((node) => !this.isComment(node)) ?? null;
      return { statements, trailingReturn: last, returnValue: value };
    }
    if (this.capabilities.tailExpressionReturns && !this.isStatement(last)) {
      return { statements, trailingReturn: last, returnValue: last };
    }
    return { statements, trailingReturn: null, returnValue: null };
  }

  dispose(): void {
    this.tree.delete();
  }

  private isComment(node: SyntaxNode): boolean {
    return this.comments.has(node.type);
  }

  private asReturn(node: SyntaxNode): SyntaxNode | null {
    if (this.returns.has(node.type)) {
      return node;
    }
    const inner = node.namedChildren;
    return inner.length === 1 && this.returns.has(inner[0].type) ? inner[0] : null;
  }

  private parameterList(fn: SyntaxNode): SyntaxNode | null {
    // C declarators nest the parameter list: function_definition > function_declarator.
    let current: SyntaxNode | null = fn;
    while (current) {
      const params = current.childForFieldName('parameters');
      if (params) {
        return params;
      }
      current = current.childForFieldName('declarator');
    }
    return null;
  }

  private parameterIdentifiers(param: SyntaxNode): SyntaxNode[] {
    if (this.isIdentifier(param)) {
      return [param];
    }
    for (const field of this.capabilities.parameterFields) {
      const child = param.childForFieldName(field);
      if (child) {
        return this.parameterIdentifiers(child);
      }
    }
    // Go's `a, b int` and Python's `a: int` keep the names as plain children.
    const direct = param.namedChildren.filter((node) => this.isIdentifier(node));
    if (direct.length > 0) {
      return direct;
    }
    for (const child of param.namedChildren) {
      const nested = this.parameterIdentifiers(child);
      if (nested.length > 0) {
        return nested;
      }
    }
    return [];
  }
}
