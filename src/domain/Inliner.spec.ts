import { TreeSitterRepository } from '../adapters/gateways/TreeSitterRepository';
import { GrammarRegistry } from '../infrastructure/treesitter/GrammarRegistry';
import { GrammarId, Point } from './entities';
import {
  ArityMismatchError,
  CallNotFoundError,
  InlineError,
  TargetUnresolvableError,
} from './errors';
import { Inliner } from './Inliner';
import { SyntaxTree } from './SyntaxTree';

const TO_INLINE = [
  'int to_inline(int a, int b) {',
  '    return a + b;',
  '}',
  '',
  'int main() {',
  '    int x = to_inline(1, 2);',
  '    return x;',
  '}',
].join('\n');

describe('Inliner', () => {
  const repository = new TreeSitterRepository(new GrammarRegistry());
  const trees: SyntaxTree[] = [];

  async function parse(filename: string, content: string, grammar: GrammarId) {
    const tree = await repository.parse({ filename, content }, grammar);
    trees.push(tree);
    return tree;
  }

  async function inline(
    filename: string,
    content: string,
    grammar: GrammarId,
    callPoint: Point,
    targetPoint: Point,
  ): Promise<string> {
    const tree = await parse(filename, content, grammar);
    const target = Inliner.resolveTarget(await parse(filename, content, grammar), targetPoint);
    return new Inliner(tree).inline(callPoint, target);
  }

  afterEach(() => {
    trees.splice(0).forEach((tree) => tree.dispose());
  });

  it('should replace a call in value position with the substituted return value', async () => {
    const result = await inline('main.c', TO_INLINE, 'c', { line: 5, col: 12 }, {
      line: 0,
      col: 4,
    });

    expect(result).toBe(TO_INLINE.replace('int x = to_inline(1, 2);', 'int x = 1 + 2;'));
  });

  it('should put the body before the call site statement', async () => {
    const source = [
      'int another_inline(int a, int b) {',
      '    int sum = a + b;',
      '    sum++;',
      '    return sum;',
      '}',
      '',
      'int main() {',
      '    int x = 1, y = 2;',
      '    int w = another_inline(x, y);',
      '    return w;',
      '}',
    ].join('\n');

    const result = await inline('main.c', source, 'c', { line: 8, col: 12 }, { line: 0, col: 4 });

    expect(result.split('\n').slice(6)).toEqual([
      'int main() {',
      '    int x = 1, y = 2;',
      '    int sum = x + y;',
      '    sum++;',
      '    int w = sum;',
      '    return w;',
      '}',
    ]);
  });

  it('should replace a standalone call with the body and drop the return', async () => {
    const source = [
      'def log_sum(a, b):',
      '    total = a + b',
      '    emit(total)',
      '    return total',
      '',
      '',
      'def main():',
      '    log_sum(3, 4)',
      '',
    ].join('\n');

    const result = await inline('main.py', source, 'python', { line: 7, col: 4 }, {
      line: 0,
      col: 4,
    });

    expect(result.split('\n').slice(6)).toEqual([
      'def main():',
      '    total = 3 + 4',
      '    emit(total)',
      '',
    ]);
  });

  it('should take a tail expression as the value', async () => {
    const source = [
      'fn area(w: u32, h: u32) -> u32 {',
      '    let s = w * h;',
      '    s',
      '}',
      '',
      'fn main() {',
      '    let a = area(3, 4);',
      '}',
    ].join('\n');

    const result = await inline('main.rs', source, 'rust', { line: 6, col: 12 }, {
      line: 0,
      col: 3,
    });

    expect(result.split('\n').slice(5)).toEqual([
      'fn main() {',
      '    let s = 3 * 4;',
      '    let a = s;',
      '}',
    ]);
  });

  it('should inline an expression-bodied arrow function', async () => {
    const source = 'const double = (n) => n * 2;\nconst y = double(21);\n';

    const result = await inline(
      'main.js',
      source,
      'javascript',
      { line: 1, col: 10 },
      { line: 0, col: 15 },
    );

    expect(result).toBe('const double = (n) => n * 2;\nconst y = 21 * 2;\n');
  });

  it('should throw ArityMismatchError with both counts', async () => {
    const source = TO_INLINE.replace('to_inline(1, 2)', 'to_inline(1)');

    const attempt = inline('main.c', source, 'c', { line: 5, col: 12 }, { line: 0, col: 4 });

    await expect(attempt).rejects.toThrow(ArityMismatchError);
    await expect(
      inline('main.c', source, 'c', { line: 5, col: 12 }, { line: 0, col: 4 }),
    ).rejects.toMatchObject({ expected: 2, actual: 1, functionName: 'to_inline' });
  });

  it('should throw CallNotFoundError when no call is under the point', async () => {
    const attempt = inline('main.c', TO_INLINE, 'c', { line: 6, col: 4 }, { line: 0, col: 4 });

    await expect(attempt).rejects.toThrow(CallNotFoundError);
  });

  it('should throw TargetUnresolvableError when the target is not a function', async () => {
    const tree = await parse('main.c', TO_INLINE, 'c');

    expect(() => Inliner.resolveTarget(tree, { line: 3, col: 0 })).toThrow(
      TargetUnresolvableError,
    );
  });

  it('should throw InlineError when a value is needed but the function returns none', async () => {
    const source = [
      'void touch(int a) {',
      '    mark(a);',
      '}',
      '',
      'int main() {',
      '    int r = touch(5);',
      '    return r;',
      '}',
    ].join('\n');

    const attempt = inline('main.c', source, 'c', { line: 5, col: 12 }, { line: 0, col: 5 });

    await expect(attempt).rejects.toThrow(InlineError);
  });

  describe('calls inside a return', () => {
    it('should keep the return around the value in C', async () => {
      const source = TO_INLINE.replace(
        '    int x = to_inline(1, 2);\n    return x;',
        '    return to_inline(1, 2);',
      );

      const result = await inline('main.c', source, 'c', { line: 5, col: 12 }, { line: 0, col: 4 });

      expect(result.split('\n').slice(4)).toEqual(['int main() {', '    return 1 + 2;', '}']);
    });

    it('should keep the return around the value in Python', async () => {
      const source = [
        'def add(a, b):',
        '    return a + b',
        '',
        '',
        'def total():',
        '    return add(1, 2)',
      ].join('\n');

      const result = await inline('main.py', source, 'python', { line: 5, col: 11 }, {
        line: 0,
        col: 4,
      });

      expect(result).toBe(source.replace('return add(1, 2)', 'return 1 + 2'));
    });
  });

  it('should drop the whole line of a standalone call with nothing to insert', async () => {
    const source = TO_INLINE.replace('int x = to_inline(1, 2);', 'to_inline(1, 2);');

    const result = await inline('main.c', source, 'c', { line: 5, col: 4 }, { line: 0, col: 4 });

    expect(result.split('\n').slice(4)).toEqual(['int main() {', '    return x;', '}']);
  });

  it('should leave member names alone when they match a parameter', async () => {
    const source = [
      'def area(shape, width):',
      '    return shape.width * width',
      '',
      '',
      'x = area(box, 3)',
    ].join('\n');

    const result = await inline('main.py', source, 'python', { line: 4, col: 4 }, {
      line: 0,
      col: 4,
    });

    expect(result.split('\n')[4]).toBe('x = box.width * 3');
  });

  it('should store a compound argument in a temporary before the call', async () => {
    const source = [
      'int dbl(int v) {',
      '    return v * 2;',
      '}',
      '',
      'int main() {',
      '    int a = 1, b = 2;',
      '    int x = dbl(a + b);',
      '    return x;',
      '}',
    ].join('\n');

    const result = await inline('main.c', source, 'c', { line: 6, col: 12 }, { line: 0, col: 4 });

    expect(result.split('\n').slice(4)).toEqual([
      'int main() {',
      '    int a = 1, b = 2;',
      '    int inline_v = a + b;',
      '    int x = inline_v * 2;',
      '    return x;',
      '}',
    ]);
  });

  describe('early returns', () => {
    it('should replace a return before the end of the body with a resume marker', async () => {
      const source = [
        'int fib(int n) {',
        '    if (n <= 1) {',
        '        return n;',
        '    }',
        '    return fib(n - 1) + fib(n - 2);',
        '}',
        '',
        'int main() {',
        '    int x = fib(10);',
        '    return x;',
        '}',
      ].join('\n');

      const result = await inline('main.c', source, 'c', { line: 8, col: 12 }, { line: 0, col: 4 });

      expect(result.split('\n').slice(7)).toEqual([
        'int main() {',
        '    if (10 <= 1) {',
        '        // early return: continue at line 12',
        '    }',
        '    int x = fib(10 - 1) + fib(10 - 2);',
        '    return x;',
        '}',
      ]);
    });

    it('should keep the Python block valid', async () => {
      const source = [
        'def clamp(v):',
        '    if v < 0:',
        '        return 0',
        '    return v',
        '',
        '',
        'y = clamp(5)',
      ].join('\n');

      const result = await inline('main.py', source, 'python', { line: 6, col: 4 }, {
        line: 0,
        col: 4,
      });

      expect(result.split('\n').slice(6)).toEqual([
        'if 5 < 0:',
        '    pass  # early return: continue at line 9',
        'y = 5',
      ]);
    });
  });
});
