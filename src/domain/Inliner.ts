import { Point } from './entities';
import {
  ArityMismatchError,
  CallNotFoundError,
  InlineError,
  TargetUnresolvableError,
} from './errors';
import { SyntaxNode, SyntaxTree, sameNode } from './SyntaxTree';
import { offsetToPoint } from '../utils/ranges';

/** A function definition the editor resolved for a call site, with the tree it lives in. */
export interface InlineTarget {
  tree: SyntaxTree;
  definition: SyntaxNode;
}

export class Inliner {
  constructor(private readonly tree: SyntaxTree) {}

  static resolveTarget(tree: SyntaxTree, point: Point): InlineTarget {
    let node: SyntaxNode | null = tree.nodeAt(point);
    while (node && !tree.isFunctionDefinition(node)) {
      node = node.parent;
    }
    if (!node || !tree.functionBody(node)) {
      throw new TargetUnresolvableError(point);
    }
    return { tree, definition: node };
  }

  findCall(point: Point): SyntaxNode {
    let node: SyntaxNode | null = this.tree.nodeAt(point);
    while (node && !this.tree.isCallExpression(node)) {
      node = node.parent;
    }
    if (!node) {
      throw new CallNotFoundError(point);
    }
    return node;
  }

  /**
   * Replaces the call at the point with the target's body, parameters swapped for the
   * argument text. Arguments other than names and literals are first stored in
   * `inline_<param>` temporaries. Returns the whole calling file.
   */
  inline(point: Point, target: InlineTarget): string {
    const call = this.findCall(point);
    const { tree: targetTree, definition } = target;
    const functionName = targetTree.functionName(definition);

    const args = this.tree.callArguments(call);
    const params = targetTree.parameterNames(definition);
    if (args.length !== params.length) {
      throw new ArityMismatchError(functionName, params.length, args.length);
    }
    const body = targetTree.functionBody(definition);
    if (!body) {
      throw new InlineError(`${functionName} has no body to inline`);
    }

    const bindings = new Map<string, string>();
    const temporaries: string[] = [];
    params.forEach((param, i) => {
      const arg = args[i];
      if (this.tree.isIdentifier(arg) || this.tree.isLiteral(arg)) {
        bindings.set(param.text, arg.text);
        return;
      }
      const name = `inline_${param.text}`;
      temporaries.push(this.declareTemporary(targetTree, definition, param, name, arg.text));
      bindings.set(param.text, name);
    });

    const preludeNodes = body.statements.filter(
      (statement) => !body.trailingReturn || !sameNode(statement, body.trailingReturn),
    );
    const content = this.tree.content;
    const statement = this.tree.enclosingStatement(call);
    const indent = statement ? lineIndent(content, statement.startIndex) : '';

    const parts = [...temporaries];
    if (preludeNodes.length > 0) {
      const first = preludeNodes[0];
      const last = preludeNodes[preludeNodes.length - 1];
      const earlyReturns = this.earlyReturns(targetTree, definition, preludeNodes);
      const text = substitute(
        targetTree,
        definition,
        bindings,
        first.startIndex,
        last.endIndex,
        earlyReturns,
      );
      parts.push(reindent(text, lineIndent(targetTree.content, first.startIndex), indent));
    }
    let prelude = parts.join(`\n${indent}`);
    if (statement) {
      // Execution resumes on the line after the prelude.
      const resumeLine = offsetToPoint(content, statement.startIndex).line + 1;
      prelude = prelude
        .split(LINE_MARKER)
        .join(String(resumeLine + prelude.split('\n').length));
    }

    if (statement && this.isStandalone(statement, call)) {
      if (!prelude) {
        return removeStatement(content, statement.startIndex, statement.endIndex);
      }
      return content.slice(0, statement.startIndex) + prelude + content.slice(statement.endIndex);
    }

    if (!body.returnValue) {
      throw new InlineError(`${functionName} returns no value to put in place of the call`);
    }
    const value = substitute(
      targetTree,
      definition,
      bindings,
      body.returnValue.startIndex,
      body.returnValue.endIndex,
    );
    if (!statement) {
      if (prelude) {
        throw new InlineError(`No statement around the call to hold the body of ${functionName}`);
      }
      return content.slice(0, call.startIndex) + value + content.slice(call.endIndex);
    }
    return (
      content.slice(0, statement.startIndex) +
      (prelude ? `${prelude}\n${indent}` : '') +
      content.slice(statement.startIndex, call.startIndex) +
      value +
      content.slice(call.endIndex)
    );
  }

  // `return f(x);` keeps its return: only an expression statement holding the call is standalone.
  private isStandalone(statement: SyntaxNode, call: SyntaxNode): boolean {
    if (sameNode(statement, call)) {
      return true;
    }
    if (!this.tree.isExpressionStatement(statement)) {
      return false;
    }
    const children = statement.namedChildren;
    return children.length === 1 && sameNode(children[0], call);
  }

  private declareTemporary(
    tree: SyntaxTree,
    definition: SyntaxNode,
    param: SyntaxNode,
    name: string,
    value: string,
  ): string {
    const declaration = tree.parameterDeclaration(definition, param);
    const renamed =
      tree.content.slice(declaration.startIndex, param.startIndex) +
      name +
      tree.content.slice(param.endIndex, declaration.endIndex);
    return fillTemplate(tree.conventions.temporary, { name, value, declaration: renamed });
  }

  /**
   * Returns inside the copied statements, each replaced by a marker naming the line where
   * the caller continues. Returns of nested functions are left alone.
   */
  private earlyReturns(
    tree: SyntaxTree,
    definition: SyntaxNode,
    nodes: SyntaxNode[],
  ): Replacement[] {
    const marker = fillTemplate(tree.conventions.earlyReturn, { line: LINE_MARKER });
    const replacements: Replacement[] = [];
    const visit = (node: SyntaxNode): void => {
      if (tree.isFunctionDefinition(node) && !sameNode(node, definition)) {
        return;
      }
      if (tree.isReturn(node)) {
        // Rust wraps `return x` in an expression statement; replace the statement whole.
        const parent = node.parent;
        const whole =
          parent && tree.isStatement(parent) && parent.namedChildren.length === 1 ? parent : node;
        replacements.push({ start: whole.startIndex, end: whole.endIndex, text: marker });
        return;
      }
      node.namedChildren.forEach(visit);
    };
    nodes.forEach(visit);
    return replacements;
  }
}

interface Replacement {
  start: number;
  end: number;
  text: string;
}

// Stands in for the resume line until the prelude's length is known.
const LINE_MARKER = '\u0000line\u0000';

/**
 * Target text between the offsets, with every parameter identifier replaced. Member names
 * are kept, and each node covered by an override is swapped for the override text.
 */
function substitute(
  tree: SyntaxTree,
  definition: SyntaxNode,
  bindings: Map<string, string>,
  start: number,
  end: number,
  overrides: Replacement[] = [],
): string {
  const replacements: Replacement[] = [];
  const visit = (node: SyntaxNode): void => {
    if (node.endIndex <= start || node.startIndex >= end) {
      return;
    }
    const override = overrides.find(
      (candidate) => candidate.start === node.startIndex && candidate.end === node.endIndex,
    );
    if (override) {
      replacements.push(override);
      return;
    }
    if (tree.isIdentifier(node)) {
      const text = tree.isMemberName(node) ? undefined : bindings.get(node.text);
      if (text !== undefined && node.startIndex >= start && node.endIndex <= end) {
        replacements.push({ start: node.startIndex, end: node.endIndex, text });
      }
      return;
    }
    node.namedChildren.forEach(visit);
  };
  visit(definition);

  let result = '';
  let cursor = start;
  for (const replacement of replacements) {
    result += tree.content.slice(cursor, replacement.start) + replacement.text;
    cursor = replacement.end;
  }
  return result + tree.content.slice(cursor, end);
}

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/** Deletes the statement, and its whole line when nothing else is on it. */
function removeStatement(content: string, start: number, end: number): string {
  const lineStart = content.lastIndexOf('\n', start - 1) + 1;
  const newline = content.indexOf('\n', end);
  const lineEnd = newline === -1 ? content.length : newline;
  const alone =
    content.slice(lineStart, start).trim() === '' && content.slice(end, lineEnd).trim() === '';
  if (!alone) {
    return content.slice(0, start) + content.slice(end);
  }
  if (newline !== -1) {
    return content.slice(0, lineStart) + content.slice(newline + 1);
  }
  return content.slice(0, Math.max(0, lineStart - 1));
}

function lineIndent(content: string, index: number): string {
  const lineStart = content.lastIndexOf('\n', index - 1) + 1;
  const match = /^[ \t]*/.exec(content.slice(lineStart, index));
  return match ? match[0] : '';
}

/** Swaps the definition's indentation for the call site's on every line after the first. */
function reindent(text: string, from: string, to: string): string {
  return text
    .split('\n')
    .map((line, i) => {
      if (i === 0) {
        return line;
      }
      const stripped = line.startsWith(from) ? line.slice(from.length) : line.trimStart();
      return stripped.length > 0 ? to + stripped : stripped;
    })
    .join('\n');
}
