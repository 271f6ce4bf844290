import * as path from 'path';
import { GrammarId, isGrammarId } from './entities';
import { UnsupportedLanguageError } from './errors';
import languages from './languages.json';

type LookupTable = Record<string, string>;

export class LanguageResolver {
  constructor(
    private readonly aliases: LookupTable = languages.aliases,
    private readonly extensions: LookupTable = languages.extensions,
    private readonly interpreters: LookupTable = languages.interpreters,
  ) {}

  /**
   * Picks a grammar from the language hint, then the file extension, then a `#!` line.
   */
  resolve(filename: string, languageHint?: string, content?: string): GrammarId {
    const fromHint = languageHint ? this.lookup(this.aliases, languageHint.toLowerCase()) : null;
    if (fromHint) {
      return fromHint;
    }

    const fromExtension = this.lookup(this.extensions, path.extname(filename).toLowerCase());
    if (fromExtension) {
      return fromExtension;
    }

    const fromShebang = content ? this.fromShebang(content) : null;
    if (fromShebang) {
      return fromShebang;
    }

    throw new UnsupportedLanguageError(filename, languageHint || undefined);
  }

  private fromShebang(content: string): GrammarId | null {
    const firstLine = content.split('\n', 1)[0];
    if (!firstLine.startsWith('#!')) {
      return null;
    }
    // `#!/usr/bin/env python3 -u` and `#!/usr/local/bin/node` both name the interpreter.
    const words = firstLine.slice(2).trim().split(/\s+/);
    const program = path.basename(words[0] ?? '');
    const interpreter =
      program === 'env' ? words.find((w, i) => i > 0 && !w.startsWith('-')) : program;
    return interpreter ? this.lookup(this.interpreters, interpreter) : null;
  }

  private lookup(table: LookupTable, key: string): GrammarId | null {
    const value = Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
    return value !== undefined && isGrammarId(value) ? value : null;
  }
}
