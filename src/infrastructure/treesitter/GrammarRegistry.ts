import * as path from 'path';
import Parser from 'web-tree-sitter';
import { GrammarId } from '../../domain/entities';
import grammars from './grammars.json';

/** A child field of one node kind, e.g. the `left` of an assignment. */
export interface FieldSite {
  kind: string;
  field: string;
}

/** Native node kinds of one grammar, mapped onto the adapter's predicates. */
export interface GrammarCapabilities {
  wasm: string;
  identifiers: string[];
  statements: string[];
  blocks: string[];
  calls: string[];
  functions: string[];
  expressionStatements: string[];
  returns: string[];
  literals: string[];
  comments: string[];
  bindings: FieldSite[];
  members: FieldSite[];
  parameterFields: string[];
  tailExpressionReturns: boolean;
  temporary: string;
  earlyReturn: string;
}

const CAPABILITIES: Record<GrammarId, GrammarCapabilities> = grammars;

export function defaultWasmDirectory(): string {
  const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
  return path.join(path.dirname(wasmPackagePath), 'out');
}

export class GrammarRegistry {
  private static runtime: Promise<void> | null = null;
  // web-tree-sitter keeps global state while a module loads; loads must not overlap.
  private static loads: Promise<void> = Promise.resolve();
  private readonly languages = new Map<GrammarId, Promise<Parser.Language>>();

  constructor(private readonly wasmDirectory: string = defaultWasmDirectory()) {}

  capabilities(grammar: GrammarId): GrammarCapabilities {
    return CAPABILITIES[grammar];
  }

  /** A fresh parser for one request. The caller deletes it. */
  async createParser(grammar: GrammarId): Promise<Parser> {
    const language = await this.language(grammar);
    const parser = new Parser();
    parser.setLanguage(language);
    return parser;
  }

  language(grammar: GrammarId): Promise<Parser.Language> {
    let pending = this.languages.get(grammar);
    if (!pending) {
      pending = this.load(grammar);
      this.languages.set(grammar, pending);
    }
    return pending;
  }

  private async load(grammar: GrammarId): Promise<Parser.Language> {
    const wasmPath = path.join(this.wasmDirectory, CAPABILITIES[grammar].wasm);
    try {
      return await GrammarRegistry.sequential(async () => {
        await GrammarRegistry.initRuntime();
        return Parser.Language.load(wasmPath);
      });
    } catch (error) {
      // Forget the failure so the next request tries again.
      this.languages.delete(grammar);
      console.error(`Failed to load grammar ${grammar} from ${wasmPath}`);
      throw error;
    }
  }

  private static sequential<T>(task: () => Promise<T>): Promise<T> {
    const run = GrammarRegistry.loads.then(task);
    // The chain only orders loads; each caller still sees its own failure through `run`.
    GrammarRegistry.loads = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private static initRuntime(): Promise<void> {
    if (!GrammarRegistry.runtime) {
      GrammarRegistry.runtime = Parser.init();
    }
    return GrammarRegistry.runtime;
  }
}
