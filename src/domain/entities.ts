export const GRAMMAR_IDS = [
  'c',
  'cpp',
  'c_sharp',
  'go',
  'java',
  'javascript',
  'python',
  'rust',
  'typescript',
  'tsx',
] as const;

export type GrammarId = (typeof GRAMMAR_IDS)[number];

export function isGrammarId(value: string): value is GrammarId {
  return (GRAMMAR_IDS as readonly string[]).includes(value);
}

export interface Point {
  line: number; // 0-based
  col: number; // 0-based, UTF-16 code units
}

export interface Range {
  start: Point;
  end: Point;
}

export type SliceDirection = 'BACKWARD' | 'FORWARD';

export interface Source {
  filename: string;
  content: string;
  language?: string;
  point: Point;
}

export interface SliceRequest {
  source: Source;
  direction: SliceDirection;
}

export interface SliceResponse {
  rangesToRemove: Range[];
}

export interface InlineRequest {
  source: Source;
  targetContent: string;
  targetPoint: Point;
}

export interface InlineResponse {
  content: string;
}

/**
 * A statement-kind node of one parsed file, with the names it mentions.
 * Parent/children link nested statements (a loop and the statements of its body).
 */
export interface StatementNode {
  ordinal: number; // pre-order position, i.e. source order
  kind: string;
  range: Range;
  startIndex: number;
  endIndex: number;
  references: Set<string>;
  defines: Set<string>;
  parent: StatementNode | null;
  children: StatementNode[];
}

export interface NameReference {
  name: string;
  statement: StatementNode;
  point: Point;
  range: Range;
  isDefinition: boolean;
}

export type SliceSeed = NameReference;
