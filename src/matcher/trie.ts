import type { SymbolMapping } from '../core/mapping';
import { BaseSymbolMatcher } from './base';
import { BoundaryRule, boundaryRuleFor, satisfiesBoundaryRule } from './symbols';
import { SymbolMatch } from './types';

interface TrieNode {
  children: Map<string, TrieNode>;
  symbol?: string;
  rule?: BoundaryRule;
}

function createNode(): TrieNode {
  return { children: new Map() };
}

/**
 * Character trie walked from every position. The deepest terminal node whose
 * boundary rule holds gives the longest match.
 */
export class TrieSymbolMatcher extends BaseSymbolMatcher {
  readonly strategy = 'trie';
  private readonly root: TrieNode = createNode();

  constructor(mapping: SymbolMapping) {
    super(mapping);
    for (const symbol of this.symbols) {
      this.insert(symbol);
    }
  }

  private insert(symbol: string): void {
    let node = this.root;
    for (let i = 0; i < symbol.length; i += 1) {
      const ch = symbol[i];
      let child = node.children.get(ch);
      if (!child) {
        child = createNode();
        node.children.set(ch, child);
      }
      node = child;
    }
    node.symbol = symbol;
    node.rule = boundaryRuleFor(symbol, this.symbols);
  }

  protected *scan(text: string): Iterable<SymbolMatch> {
    let index = 0;
    while (index < text.length) {
      const match = this.longestAt(text, index);
      if (match) {
        yield match;
        index = match.end;
        continue;
      }
      const codePoint = text.codePointAt(index) ?? 0;
      index += codePoint > 0xffff ? 2 : 1;
    }
  }

  private longestAt(text: string, start: number): SymbolMatch | undefined {
    let node = this.root;
    let best: SymbolMatch | undefined;
    for (let i = start; i < text.length; i += 1) {
      const child = node.children.get(text[i]);
      if (!child) {
        break;
      }
      node = child;
      if (node.symbol === undefined || node.rule === undefined) {
        continue;
      }
      if (!satisfiesBoundaryRule(node.rule, text, start, i + 1)) {
        continue;
      }
      best = { start, end: i + 1, symbol: node.symbol };
    }
    return best;
  }
}
