import * as path from 'path';
import Table from 'cli-table3';
import { InlineResponse, Point, Range, SliceResponse } from '../../domain/entities';
import { removeRanges } from '../../utils/ranges';

export interface SliceView {
  filePath: string;
  content: string;
  point: Point;
}

export class CliPresenter {
  private toRelativePath(filePath: string): string {
    return path.relative(process.cwd(), filePath);
  }

  public presentSlice(
    response: SliceResponse,
    view: SliceView,
    options: { table?: boolean; apply?: boolean },
  ): void {
    if (options.apply) {
      console.log(removeRanges(view.content, response.rangesToRemove, view.point).content);
      return;
    }
    if (!options.table) {
      console.log(JSON.stringify(response, null, 2));
      return;
    }
    if (response.rangesToRemove.length === 0) {
      console.log('Nothing to remove.');
      return;
    }
    this.renderRangeTable(view, response.rangesToRemove);
  }

  public presentInline(response: InlineResponse, filePath: string, options: { write?: boolean }) {
    if (options.write) {
      console.log(`Inlined into ${this.toRelativePath(filePath)}`);
      return;
    }
    console.log(response.content);
  }

  private renderRangeTable(view: SliceView, ranges: Range[]): void {
    const lines = view.content.split('\n');
    const table = new Table({
      head: ['File', 'From', 'To', 'Preview'],
      style: { head: ['cyan'] },
      wordWrap: true,
    });

    ranges.forEach((range) => {
      const firstLine = lines[range.start.line] ?? '';
      table.push([
        this.toRelativePath(view.filePath),
        this.formatPoint(range.start),
        this.formatPoint(range.end),
        firstLine.slice(range.start.col).trim().substring(0, 50),
      ]);
    });

    console.log(table.toString());
  }

  // Editors count from 1.
  private formatPoint(point: Point): string {
    return `${point.line + 1}:${point.col + 1}`;
  }
}
