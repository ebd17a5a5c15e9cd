// Unicode word characters: letters, marks, decimal digits, connector
// punctuation and joiners.
export const WORD_CHAR_CLASS = '[\\p{Alphabetic}\\p{M}\\p{Nd}\\p{Pc}\\p{Join_Control}]';

const WORD_SYMBOL = /^[\p{Alphabetic}\p{N}_]+$/u;
const WORD_CHAR = new RegExp(`^${WORD_CHAR_CLASS}$`, 'u');

export interface BoundaryRule {
  before: boolean;
  after: boolean;
}

/** Symbols made only of letters, digits and underscores are identifier-like. */
function isWordSymbol(symbol: string): boolean {
  return WORD_SYMBOL.test(symbol);
}

/**
 * Identifier-like symbols need a word boundary before them. They need one after
 * them too, unless they extend a shorter configured symbol: then the longer
 * symbol wins where the shorter one starts, whatever follows it.
 */
export function boundaryRuleFor(symbol: string, symbols: readonly string[]): BoundaryRule {
  if (!isWordSymbol(symbol)) {
    return { before: false, after: false };
  }
  const extendsShorter = symbols.some((other) => other.length < symbol.length && symbol.startsWith(other));
  return { before: true, after: !extendsShorter };
}

export function orderSymbols(symbols: Iterable<string>): string[] {
  return [...symbols].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

function isWordCharAt(text: string, index: number): boolean {
  const codePoint = text.codePointAt(index);
  return codePoint !== undefined && WORD_CHAR.test(String.fromCodePoint(codePoint));
}

function isWordCharBefore(text: string, index: number): boolean {
  if (index <= 0) {
    return false;
  }
  const low = text.charCodeAt(index - 1);
  if (low >= 0xdc00 && low <= 0xdfff && index >= 2) {
    const high = text.charCodeAt(index - 2);
    if (high >= 0xd800 && high <= 0xdbff) {
      return isWordCharAt(text, index - 2);
    }
  }
  return isWordCharAt(text, index - 1);
}

export function satisfiesBoundaryRule(rule: BoundaryRule, text: string, start: number, end: number): boolean {
  if (rule.before && isWordCharBefore(text, start)) {
    return false;
  }
  return !(rule.after && isWordCharAt(text, end));
}

/**
 * Every match begins with the first code point of some symbol, so a text that
 * holds none of them cannot contain a match.
 */
export class SymbolPrefilter {
  private readonly leading: ReadonlySet<string>;

  constructor(symbols: readonly string[]) {
    const leading = new Set<string>();
    for (const symbol of symbols) {
      const codePoint = symbol.codePointAt(0);
      if (codePoint !== undefined) {
        leading.add(String.fromCodePoint(codePoint));
      }
    }
    this.leading = leading;
  }

  mayMatch(text: string): boolean {
    if (this.leading.size === 0) {
      return false;
    }
    for (const ch of text) {
      if (this.leading.has(ch)) {
        return true;
      }
    }
    return false;
  }
}
