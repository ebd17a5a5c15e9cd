import { RestorationInconsistencyError } from '../core/errors';
import { Result, err, ok } from '../core/result';
import {
  PLACEHOLDER_PATTERN,
  containsReservedChar,
  decodePlaceholderIndex,
  encodePlaceholder,
} from './placeholder';

export type LiteralKind = 'triple-string' | 'string' | 'comment' | 'reserved';

export interface ProtectedSpan {
  index: number;
  kind: LiteralKind;
  original: string;
}

export interface ProtectedSource {
  text: string;
  spans: ProtectedSpan[];
}

interface LiteralExtent {
  end: number;
  kind: LiteralKind;
}

const STRING_PREFIXES = new Set(['r', 'u', 'b', 'f', 'rb', 'br', 'fr', 'rf']);
const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;

function isQuote(ch: string | undefined): ch is '"' | "'" {
  return ch === '"' || ch === "'";
}

function prefixLengthAt(source: string, start: number): number | undefined {
  if (isQuote(source[start])) {
    return 0;
  }
  if (start > 0 && IDENTIFIER_CHAR.test(source[start - 1])) {
    return undefined;
  }
  for (const length of [2, 1]) {
    const prefix = source.slice(start, start + length).toLowerCase();
    if (STRING_PREFIXES.has(prefix) && isQuote(source[start + length])) {
      return length;
    }
  }
  return undefined;
}

function scanTripleQuoted(source: string, bodyStart: number, delimiter: string): number {
  let i = bodyStart;
  while (i < source.length) {
    if (source[i] === '\\') {
      i += 2;
      continue;
    }
    if (source.startsWith(delimiter, i)) {
      return i + delimiter.length;
    }
    i += 1;
  }
  return source.length;
}

function scanSingleLine(source: string, bodyStart: number, quote: string): number {
  let i = bodyStart;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\n') {
      return i;
    }
    if (ch === '\\' && source[i + 1] !== '\n') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      return i + 1;
    }
    i += 1;
  }
  return source.length;
}

function scanStringLiteral(source: string, start: number): LiteralExtent | undefined {
  const prefixLength = prefixLengthAt(source, start);
  if (prefixLength === undefined) {
    return undefined;
  }
  const quoteStart = start + prefixLength;
  const quote = source[quoteStart];
  const triple = quote.repeat(3);
  if (source.startsWith(triple, quoteStart)) {
    return { end: scanTripleQuoted(source, quoteStart + 3, triple), kind: 'triple-string' };
  }
  return { end: scanSingleLine(source, quoteStart + 1, quote), kind: 'string' };
}

function scanComment(source: string, start: number): LiteralExtent {
  const newline = source.indexOf('\n', start);
  return { end: newline === -1 ? source.length : newline, kind: 'comment' };
}

/**
 * Replaces string literals and `#` comments with numbered placeholders.
 *
 * Unterminated triple-quoted strings run to end of input; unterminated
 * single-line strings stop before the newline. Reserved placeholder characters
 * found in code are protected as one-character spans.
 */
export function protectLiterals(source: string): ProtectedSource {
  const spans: ProtectedSpan[] = [];
  let text = '';
  let cursor = 0;
  let index = 0;

  const protect = (start: number, extent: LiteralExtent) => {
    text += source.slice(cursor, start);
    text += encodePlaceholder(spans.length);
    spans.push({ index: spans.length, kind: extent.kind, original: source.slice(start, extent.end) });
    cursor = extent.end;
    index = extent.end;
  };

  while (index < source.length) {
    const ch = source[index];
    if (ch === '#') {
      protect(index, scanComment(source, index));
      continue;
    }
    const literal = scanStringLiteral(source, index);
    if (literal) {
      protect(index, literal);
      continue;
    }
    if (containsReservedChar(ch)) {
      protect(index, { end: index + 1, kind: 'reserved' });
      continue;
    }
    index += 1;
  }

  text += source.slice(cursor);
  return { text, spans };
}

/** Single pass; restored content is never rescanned. */
export function restoreLiterals(
  text: string,
  spans: readonly ProtectedSpan[],
): Result<string, RestorationInconsistencyError> {
  let restored = '';
  let cursor = 0;
  let next = 0;

  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? 0;
    const found = decodePlaceholderIndex(match[1]);
    if (found !== next || next >= spans.length) {
      return err(
        new RestorationInconsistencyError(`Placeholder ${found} found where ${next} was expected`, next, found),
      );
    }
    restored += text.slice(cursor, start) + spans[next].original;
    cursor = start + match[0].length;
    next += 1;
  }

  if (next !== spans.length) {
    return err(
      new RestorationInconsistencyError(
        `Restored ${next} of ${spans.length} protected spans`,
        spans.length,
        next,
      ),
    );
  }

  return ok(restored + text.slice(cursor));
}
