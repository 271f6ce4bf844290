import { SliceRequest, SliceResponse } from '../domain/entities';
import { LanguageResolver } from '../domain/LanguageResolver';
import { ReferenceIndex } from '../domain/ReferenceIndex';
import { Slicer } from '../domain/Slicer';
import { ISyntaxRepository } from './ports/ISyntaxRepository';

export class SliceUseCase {
  constructor(
    private readonly syntaxRepo: ISyntaxRepository,
    private readonly resolver: LanguageResolver = new LanguageResolver(),
  ) {}

  async execute(request: SliceRequest): Promise<SliceResponse> {
    const { source, direction } = request;
    const grammar = this.resolver.resolve(source.filename, source.language, source.content);
    const tree = await this.syntaxRepo.parse(source, grammar);
    try {
      const index = ReferenceIndex.build(tree);
      const rangesToRemove = new Slicer(index, tree.content).sliceAt(source.point, direction);
      return { rangesToRemove };
    } finally {
      tree.dispose();
    }
  }
}
