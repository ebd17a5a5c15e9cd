import type { SymbolMapping } from '../core/mapping';
import { CompiledMatcher, MatcherStrategy, SymbolMatch } from './types';
import { SymbolPrefilter, orderSymbols } from './symbols';

export abstract class BaseSymbolMatcher implements CompiledMatcher {
  abstract readonly strategy: MatcherStrategy;
  readonly mapping: SymbolMapping;
  readonly symbols: readonly string[];
  private readonly prefilter: SymbolPrefilter;

  constructor(mapping: SymbolMapping) {
    this.mapping = new Map(mapping);
    this.symbols = Object.freeze(orderSymbols(mapping.keys()));
    this.prefilter = new SymbolPrefilter(this.symbols);
  }

  isEmpty(): boolean {
    return this.symbols.length === 0;
  }

  mayContainSymbols(text: string): boolean {
    return this.prefilter.mayMatch(text);
  }

  findAll(text: string): Iterable<SymbolMatch> {
    if (this.isEmpty()) {
      return [];
    }
    return this.scan(text);
  }

  protected abstract scan(text: string): Iterable<SymbolMatch>;
}
