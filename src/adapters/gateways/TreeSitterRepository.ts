import Parser from 'web-tree-sitter';
import { GrammarId } from '../../domain/entities';
import { ParseFailureError } from '../../domain/errors';
import { SyntaxTree } from '../../domain/SyntaxTree';
import { GrammarRegistry } from '../../infrastructure/treesitter/GrammarRegistry';
import { TreeSitterSyntaxTree } from '../../infrastructure/treesitter/TreeSitterSyntaxTree';
import { ISyntaxRepository, SourceText } from '../../usecases/ports/ISyntaxRepository';

export class TreeSitterRepository implements ISyntaxRepository {
  constructor(private readonly registry: GrammarRegistry) {}

  async parse(source: SourceText, grammar: GrammarId): Promise<SyntaxTree> {
    const parser = await this.createParser(source.filename, grammar);
    try {
      const tree = parser.parse(source.content);
      if (!tree) {
        throw new ParseFailureError(source.filename, 'the parser produced no tree');
      }
      const syntaxTree = new TreeSitterSyntaxTree(
        tree,
        source.filename,
        source.content,
        grammar,
        this.registry.capabilities(grammar),
      );
      if (syntaxTree.hasSyntaxErrors()) {
        console.warn(`${source.filename} has syntax errors; results may be partial.`);
      }
      return syntaxTree;
    } finally {
      parser.delete();
    }
  }

  private async createParser(filename: string, grammar: GrammarId): Promise<Parser> {
    try {
      return await this.registry.createParser(grammar);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParseFailureError(filename, `grammar ${grammar} could not be loaded (${reason})`);
    }
  }
}
