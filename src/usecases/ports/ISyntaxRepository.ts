import { GrammarId } from '../../domain/entities';
import { SyntaxTree } from '../../domain/SyntaxTree';

export interface SourceText {
  filename: string;
  content: string;
}

export interface ISyntaxRepository {
  /** Parses one file. The returned tree belongs to the caller, who disposes it. */
  parse(source: SourceText, grammar: GrammarId): Promise<SyntaxTree>;
}
