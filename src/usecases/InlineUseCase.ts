import { InlineRequest, InlineResponse } from '../domain/entities';
import { Inliner } from '../domain/Inliner';
import { LanguageResolver } from '../domain/LanguageResolver';
import { ISyntaxRepository } from './ports/ISyntaxRepository';

export class InlineUseCase {
  constructor(
    private readonly syntaxRepo: ISyntaxRepository,
    private readonly resolver: LanguageResolver = new LanguageResolver(),
  ) {}

  async execute(request: InlineRequest): Promise<InlineResponse> {
    const { source, targetContent, targetPoint } = request;
    const grammar = this.resolver.resolve(source.filename, source.language, source.content);

    // The definition is parsed with the caller's grammar; the editor only sends its text.
    const callTree = await this.syntaxRepo.parse(source, grammar);
    try {
      const targetTree = await this.syntaxRepo.parse(
        { filename: source.filename, content: targetContent },
        grammar,
      );
      try {
        const target = Inliner.resolveTarget(targetTree, targetPoint);
        return { content: new Inliner(callTree).inline(source.point, target) };
      } finally {
        targetTree.dispose();
      }
    } finally {
      callTree.dispose();
    }
  }
}
