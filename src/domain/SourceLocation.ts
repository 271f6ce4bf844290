import { Point } from './entities';
import { InvalidLocationError } from './errors';

/**
 * A `file:line:col` location as typed on the command line, 1-based like editors display it.
 */
export class SourceLocation {
  constructor(
    public readonly filePath: string,
    public readonly line: number,
    public readonly column: number,
  ) {}

  static parse(location: string): SourceLocation {
    const parts = location.split(':');
    // Paths may contain colons (Windows drive letters); line and column are the last two parts.
    if (parts.length < 3) {
      throw new InvalidLocationError(location);
    }

    const colStr = parts.pop() ?? '';
    const lineStr = parts.pop() ?? '';

    const column = parseInt(colStr, 10);
    const line = parseInt(lineStr, 10);

    if (isNaN(column) || isNaN(line)) {
      throw new InvalidLocationError(location, 'Invalid line or column in location');
    }
    if (line < 1 || column < 1) {
      throw new InvalidLocationError(location, 'Line and column are 1-based');
    }

    return new SourceLocation(parts.join(':'), line, column);
  }

  static fromPoint(filePath: string, point: Point): SourceLocation {
    return new SourceLocation(filePath, point.line + 1, point.col + 1);
  }

  toPoint(): Point {
    return { line: this.line - 1, col: this.column - 1 };
  }

  toString(): string {
    return `${this.filePath}:${this.line}:${this.column}`;
  }

  equals(other: SourceLocation): boolean {
    return (
      this.filePath === other.filePath && this.line === other.line && this.column === other.column
    );
  }
}
