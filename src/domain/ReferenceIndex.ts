import { NameReference, Point, StatementNode } from './entities';
import { SyntaxNode, SyntaxTree } from './SyntaxTree';
import { comparePoints } from '../utils/ranges';

/**
 * Name -> statements that mention the name, in source order. Built once per tree by
 * text identity alone: two unrelated `i` variables share one entry.
 */
export class ReferenceIndex {
  private constructor(
    readonly statements: StatementNode[],
    readonly roots: StatementNode[],
    readonly references: NameReference[],
    private readonly index: Map<string, StatementNode[]>,
  ) {}

  static build(tree: SyntaxTree): ReferenceIndex {
    const statements: StatementNode[] = [];
    const roots: StatementNode[] = [];
    const references: NameReference[] = [];
    const index = new Map<string, StatementNode[]>();

    const visit = (node: SyntaxNode, current: StatementNode | null): void => {
      let owner = current;
      if (tree.isStatement(node)) {
        const range = tree.span(node);
        const statement: StatementNode = {
          ordinal: statements.length,
          kind: node.type,
          range,
          startIndex: node.startIndex,
          endIndex: node.endIndex,
          references: new Set(),
          defines: new Set(),
          parent: current,
          children: [],
        };
        statements.push(statement);
        (current ? current.children : roots).push(statement);
        owner = statement;
      } else if (owner && tree.isIdentifier(node)) {
        const name = node.text;
        const isDefinition = tree.isBinding(node);
        owner.references.add(name);
        if (isDefinition) {
          owner.defines.add(name);
        }
        const bucket = index.get(name) ?? [];
        bucket.push(owner);
        index.set(name, bucket);
        const range = tree.span(node);
        references.push({ name, statement: owner, point: range.start, range, isDefinition });
      }

      for (const child of node.namedChildren) {
        visit(child, owner);
      }
    };

    visit(tree.root, null);
    return new ReferenceIndex(statements, roots, references, index);
  }

  /** Statements mentioning the name, one entry per occurrence. */
  statementsReferencing(name: string): StatementNode[] {
    return this.index.get(name) ?? [];
  }

  names(): string[] {
    return [...this.index.keys()];
  }

  /** The innermost statement whose range contains the point. */
  statementAt(point: Point): StatementNode | null {
    let found: StatementNode | null = null;
    let candidates = this.roots;
    for (;;) {
      const hit = candidates.find(
        (s) => comparePoints(s.range.start, point) <= 0 && comparePoints(point, s.range.end) <= 0,
      );
      if (!hit) {
        return found;
      }
      found = hit;
      candidates = hit.children;
    }
  }
}
