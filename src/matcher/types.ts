import type { SymbolMapping } from '../core/mapping';

export type MatcherStrategy = 'regex' | 'trie';

export interface SymbolMatch {
  start: number;
  end: number;
  symbol: string;
}

/**
 * Finds non-overlapping, longest-match-first occurrences of the configured
 * symbols. Implementations are immutable once built.
 */
export interface CompiledMatcher {
  readonly strategy: MatcherStrategy;
  readonly mapping: SymbolMapping;
  /** Symbols ordered longest first. */
  readonly symbols: readonly string[];
  isEmpty(): boolean;
  /** False only when `text` cannot contain any symbol. */
  mayContainSymbols(text: string): boolean;
  findAll(text: string): Iterable<SymbolMatch>;
}

export interface MatcherFactory {
  id: MatcherStrategy;
  description: string;
  create(mapping: SymbolMapping): CompiledMatcher;
}

export interface CompileOptions {
  strategy?: MatcherStrategy;
}
