import { EngineController } from './adapters/controllers/EngineController';
import { TreeSitterRepository } from './adapters/gateways/TreeSitterRepository';
import { GrammarRegistry } from './infrastructure/treesitter/GrammarRegistry';
import { InlineUseCase } from './usecases/InlineUseCase';
import { SliceUseCase } from './usecases/SliceUseCase';

export interface EngineOptions {
  wasmDirectory?: string;
}

/** Wires grammars, use cases and the controller shared by the HTTP and stdio transports. */
export function createEngine(options: EngineOptions = {}): EngineController {
  const registry = new GrammarRegistry(options.wasmDirectory);
  const syntaxRepo = new TreeSitterRepository(registry);

  const sliceUC = new SliceUseCase(syntaxRepo);
  const inlineUC = new InlineUseCase(syntaxRepo);

  return new EngineController(sliceUC, inlineUC);
}
