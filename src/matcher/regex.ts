import type { SymbolMapping } from '../core/mapping';
import { BaseSymbolMatcher } from './base';
import { WORD_CHAR_CLASS, boundaryRuleFor } from './symbols';
import { SymbolMatch } from './types';

const WORD_BEFORE = `(?<!${WORD_CHAR_CLASS})`;
const WORD_AFTER = `(?!${WORD_CHAR_CLASS})`;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

export function buildSymbolPattern(symbols: readonly string[]): string {
  return symbols
    .map((symbol) => {
      const rule = boundaryRuleFor(symbol, symbols);
      return `${rule.before ? WORD_BEFORE : ''}${escapeRegExp(symbol)}${rule.after ? WORD_AFTER : ''}`;
    })
    .join('|');
}

/** Single alternation, longest symbols first, so the leftmost alternative that fits is the longest. */
export class RegexSymbolMatcher extends BaseSymbolMatcher {
  readonly strategy = 'regex';
  private readonly pattern: RegExp | undefined;

  constructor(mapping: SymbolMapping) {
    super(mapping);
    this.pattern = this.symbols.length > 0 ? new RegExp(buildSymbolPattern(this.symbols), 'gu') : undefined;
  }

  protected *scan(text: string): Iterable<SymbolMatch> {
    if (!this.pattern) {
      return;
    }
    for (const match of text.matchAll(this.pattern)) {
      const start = match.index ?? 0;
      yield { start, end: start + match[0].length, symbol: match[0] };
    }
  }
}
