import type { SymbolMapping } from '../core/mapping';
import { RegexSymbolMatcher } from './regex';
import { TrieSymbolMatcher } from './trie';
import { CompiledMatcher, MatcherFactory, MatcherStrategy } from './types';

export class MatcherRegistry {
  private factories = new Map<string, MatcherFactory>();

  constructor() {
    this.register({
      id: 'regex',
      description: 'Single RegExp alternation with Unicode-aware word boundaries',
      create: (mapping) => new RegexSymbolMatcher(mapping),
    });
    this.register({
      id: 'trie',
      description: 'Character trie walked at every position',
      create: (mapping) => new TrieSymbolMatcher(mapping),
    });
  }

  register(factory: MatcherFactory): void {
    this.factories.set(factory.id, factory);
  }

  has(id: string): id is MatcherStrategy {
    return this.factories.has(id);
  }

  create(id: MatcherStrategy, mapping: SymbolMapping): CompiledMatcher {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new Error(`Matcher strategy "${id}" is not registered`);
    }
    return factory.create(mapping);
  }

  list(): MatcherFactory[] {
    return [...this.factories.values()];
  }
}

export const matcherRegistry = new MatcherRegistry();
