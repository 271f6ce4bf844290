import { TreeSitterRepository } from '../adapters/gateways/TreeSitterRepository';
import { GrammarId, InlineRequest } from '../domain/entities';
import { TargetUnresolvableError } from '../domain/errors';
import { SyntaxTree } from '../domain/SyntaxTree';
import { GrammarRegistry } from '../infrastructure/treesitter/GrammarRegistry';
import { InlineUseCase } from './InlineUseCase';
import { ISyntaxRepository, SourceText } from './ports/ISyntaxRepository';

const CALLER = [
  '#include "lib.h"',
  '',
  'int main() {',
  '    int x = to_inline(1, 2);',
  '    return x;',
  '}',
].join('\n');
const LIBRARY = ['int to_inline(int a, int b) {', '    return a + b;', '}'].join('\n');

describe('InlineUseCase', () => {
  const realRepo = new TreeSitterRepository(new GrammarRegistry());
  let useCase: InlineUseCase;
  let mockRepo: jest.Mocked<ISyntaxRepository>;
  let parsed: SyntaxTree[];

  beforeEach(() => {
    parsed = [];
    mockRepo = {
      parse: jest.fn(async (source: SourceText, grammar: GrammarId) => {
        const tree = await realRepo.parse(source, grammar);
        jest.spyOn(tree, 'dispose');
        parsed.push(tree);
        return tree;
      }),
    };
    useCase = new InlineUseCase(mockRepo);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should inline a definition from another file into the caller', async () => {
    const request: InlineRequest = {
      source: { filename: 'main.c', content: CALLER, point: { line: 3, col: 12 } },
      targetContent: LIBRARY,
      targetPoint: { line: 0, col: 4 },
    };

    const response = await useCase.execute(request);

    expect(response.content).toBe(CALLER.replace('to_inline(1, 2)', '1 + 2'));
    expect(mockRepo.parse).toHaveBeenCalledTimes(2);
    expect(mockRepo.parse).toHaveBeenLastCalledWith({ filename: 'main.c', content: LIBRARY }, 'c');
    parsed.forEach((tree) => expect(tree.dispose).toHaveBeenCalledTimes(1));
  });

  it('should release both trees when the target cannot be resolved', async () => {
    const request: InlineRequest = {
      source: { filename: 'main.c', content: CALLER, point: { line: 3, col: 12 } },
      targetContent: `${LIBRARY}\n\nint limit = 3;\n`,
      targetPoint: { line: 4, col: 4 },
    };

    await expect(useCase.execute(request)).rejects.toThrow(TargetUnresolvableError);
    expect(parsed).toHaveLength(2);
    parsed.forEach((tree) => expect(tree.dispose).toHaveBeenCalledTimes(1));
  });
});
