import { MappingError } from './errors';
import { Result, err, ok } from './result';

export type SymbolMapping = ReadonlyMap<string, string>;

export type SymbolEntries = Iterable<readonly [string, string]>;

/**
 * Builds an immutable symbol mapping. Accepts a plain record or an ordered list
 * of pairs; when a symbol appears more than once the last entry wins.
 */
export function buildSymbolMapping(
  input: Readonly<Record<string, unknown>> | SymbolEntries,
): Result<SymbolMapping, MappingError> {
  const entries: Iterable<readonly [string, unknown]> = isEntryIterable(input) ? input : Object.entries(input);
  const mapping = new Map<string, string>();

  for (const [symbol, replacement] of entries) {
    if (typeof symbol !== 'string' || symbol.length === 0) {
      return err(new MappingError('Symbol keys must be non-empty strings'));
    }
    if (typeof replacement !== 'string') {
      return err(new MappingError(`Replacement for symbol ${JSON.stringify(symbol)} must be a string`));
    }
    mapping.set(symbol, replacement);
  }

  return ok(mapping);
}

function isEntryIterable(input: Readonly<Record<string, unknown>> | SymbolEntries): input is SymbolEntries {
  return Symbol.iterator in input;
}
