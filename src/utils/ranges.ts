import { Point, Range } from '../domain/entities';

export function comparePoints(a: Point, b: Point): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.col - b.col;
}

export function compareRanges(a: Range, b: Range): number {
  return comparePoints(a.start, b.start) || comparePoints(a.end, b.end);
}

export function sortRanges(ranges: Range[]): Range[] {
  return [...ranges].sort(compareRanges);
}

/**
 * Sorts ranges and merges the ones that overlap or touch, so the result is
 * non-overlapping and ascending.
 */
export function mergeRanges(ranges: Range[]): Range[] {
  const merged: Range[] = [];
  for (const range of sortRanges(ranges)) {
    const last = merged[merged.length - 1];
    if (last && comparePoints(range.start, last.end) <= 0) {
      if (comparePoints(range.end, last.end) > 0) {
        last.end = { ...range.end };
      }
      continue;
    }
    merged.push({ start: { ...range.start }, end: { ...range.end } });
  }
  return merged;
}

export function pointToOffset(content: string, point: Point): number {
  let offset = 0;
  for (let line = 0; line < point.line; line++) {
    const newline = content.indexOf('\n', offset);
    if (newline === -1) {
      return content.length;
    }
    offset = newline + 1;
  }
  return Math.min(offset + point.col, content.length);
}

export function offsetToPoint(content: string, offset: number): Point {
  const before = content.slice(0, Math.max(0, Math.min(offset, content.length)));
  const lineStart = before.lastIndexOf('\n') + 1;
  return { line: before.split('\n').length - 1, col: before.length - lineStart };
}

export interface RemovalResult {
  content: string;
  point: Point;
}

/**
 * Deletes the ranges from the content. Lines no range touches are copied as they are;
 * a touched line keeps only its text outside the ranges and disappears when that text
 * is blank. The point is moved to where the same character ends up.
 */
export function removeRanges(content: string, ranges: Range[], point: Point): RemovalResult {
  const lines = content.split('\n');
  const cutsByLine = new Map<number, Array<[number, number]>>();

  for (const range of mergeRanges(ranges)) {
    for (let line = range.start.line; line <= range.end.line && line < lines.length; line++) {
      const from = line === range.start.line ? range.start.col : 0;
      const to = line === range.end.line ? range.end.col : lines[line].length;
      const cuts = cutsByLine.get(line) ?? [];
      cuts.push([from, to]);
      cutsByLine.set(line, cuts);
    }
  }

  const output: string[] = [];
  let newPoint: Point | null = null;

  for (let lineNo = 0; lineNo < lines.length; lineNo++) {
    const text = lines[lineNo];
    const cuts = cutsByLine.get(lineNo);
    if (!cuts) {
      if (lineNo === point.line) {
        newPoint = { line: output.length, col: point.col };
      }
      output.push(text);
      continue;
    }

    let kept = '';
    let cursor = 0;
    let shift = 0;
    for (const [from, to] of cuts) {
      kept += text.slice(cursor, from);
      if (lineNo === point.line && point.col > from) {
        shift += Math.min(point.col, to) - from;
      }
      cursor = Math.max(cursor, to);
    }
    kept += text.slice(cursor);

    if (kept.trim().length === 0) {
      if (lineNo === point.line) {
        newPoint = { line: output.length, col: 0 };
      }
      continue;
    }

    if (lineNo === point.line) {
      newPoint = { line: output.length, col: point.col - shift };
    }
    output.push(kept);
  }

  const removedLines = lines.length - output.length;
  return {
    content: output.join('\n'),
    point: newPoint ?? { line: Math.max(0, point.line - removedLines), col: point.col },
  };
}
