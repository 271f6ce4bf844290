import { Point, Range, SliceDirection, SliceSeed, StatementNode } from './entities';
import { SeedNotFoundError } from './errors';
import { ReferenceIndex } from './ReferenceIndex';
import { comparePoints, mergeRanges } from '../utils/ranges';

export class Slicer {
  constructor(
    private readonly index: ReferenceIndex,
    private readonly content: string,
  ) {}

  /**
   * A reference under the point wins. Otherwise BACKWARD takes the last reference
   * starting at or before the point and FORWARD the first one starting at or after it.
   */
  selectSeed(point: Point, direction: SliceDirection): SliceSeed | null {
    const { references } = this.index;
    const containing = references.find(
      (ref) =>
        comparePoints(ref.range.start, point) <= 0 && comparePoints(point, ref.range.end) <= 0,
    );
    if (containing) {
      return containing;
    }
    if (direction === 'BACKWARD') {
      const before = references.filter((ref) => comparePoints(ref.range.start, point) <= 0);
      return before.length > 0 ? before[before.length - 1] : null;
    }
    return references.find((ref) => comparePoints(ref.range.start, point) >= 0) ?? null;
  }

  /** Statements reachable from the seed through shared names, on one side of it. */
  keptStatements(seed: SliceSeed, direction: SliceDirection): Set<StatementNode> {
    const kept = new Set<StatementNode>([seed.statement]);
    const visited = new Set<string>();
    const frontier = [seed.name];

    for (let name = frontier.pop(); name !== undefined; name = frontier.pop()) {
      if (visited.has(name)) {
        continue;
      }
      visited.add(name);
      for (const statement of this.index.statementsReferencing(name)) {
        if (this.onSide(statement, seed.statement, direction)) {
          kept.add(statement);
          frontier.push(...statement.references, ...statement.defines);
        }
      }
    }
    return kept;
  }

  slice(seed: SliceSeed, direction: SliceDirection): Range[] {
    return this.rangesToRemove(this.keptStatements(seed, direction));
  }

  /**
   * Slices from the reference nearest the point. With no reference on that side,
   * the statement under the point is kept on its own.
   */
  sliceAt(point: Point, direction: SliceDirection): Range[] {
    const seed = this.selectSeed(point, direction);
    if (seed) {
      return this.slice(seed, direction);
    }
    const statement = this.index.statementAt(point);
    if (!statement) {
      throw new SeedNotFoundError(point);
    }
    const side = direction === 'BACKWARD' ? 'before' : 'after';
    console.warn(
      `No identifier ${side} ${point.line}:${point.col}, keeping the enclosing statement only.`,
    );
    return this.rangesToRemove(new Set([statement]));
  }

  private onSide(
    statement: StatementNode,
    seedStatement: StatementNode,
    direction: SliceDirection,
  ): boolean {
    const order = comparePoints(statement.range.start, seedStatement.range.start);
    return direction === 'BACKWARD' ? order <= 0 : order >= 0;
  }

  private rangesToRemove(kept: Set<StatementNode>): Range[] {
    const removed: StatementNode[] = [];
    const collect = (statements: StatementNode[]): void => {
      for (const statement of statements) {
        // A dropped loop or branch that still holds kept code loses only its other parts.
        if (kept.has(statement) || this.containsKept(statement, kept)) {
          collect(statement.children);
        } else {
          removed.push(statement);
        }
      }
    };
    collect(this.index.roots);
    removed.sort((a, b) => a.startIndex - b.startIndex);

    const spans: Array<{ range: Range; endIndex: number }> = [];
    for (const statement of removed) {
      const last = spans[spans.length - 1];
      if (last && this.content.slice(last.endIndex, statement.startIndex).trim() === '') {
        last.range = { start: last.range.start, end: statement.range.end };
        last.endIndex = statement.endIndex;
        continue;
      }
      spans.push({ range: statement.range, endIndex: statement.endIndex });
    }
    return mergeRanges(spans.map((span) => span.range));
  }

  private containsKept(statement: StatementNode, kept: Set<StatementNode>): boolean {
    return statement.children.some((child) => kept.has(child) || this.containsKept(child, kept));
  }
}
