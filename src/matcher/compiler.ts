import { CompileError, errorMessage } from '../core/errors';
import type { SymbolMapping } from '../core/mapping';
import { Result, err, ok } from '../core/result';
import { containsReservedChar } from '../protection/placeholder';
import { matcherRegistry } from './registry';
import { CompileOptions, CompiledMatcher } from './types';

export const DEFAULT_STRATEGY = 'regex';

export function compile(mapping: SymbolMapping, options: CompileOptions = {}): Result<CompiledMatcher, CompileError> {
  const strategy = options.strategy ?? DEFAULT_STRATEGY;
  if (!matcherRegistry.has(strategy)) {
    return err(new CompileError(`Unknown matcher strategy "${strategy}"`));
  }

  for (const [symbol, replacement] of mapping) {
    if (symbol.length === 0) {
      return err(new CompileError('Symbol keys must be non-empty'));
    }
    if (containsReservedChar(symbol) || containsReservedChar(replacement)) {
      return err(
        new CompileError(
          `Mapping for symbol ${JSON.stringify(symbol)} uses characters reserved for literal placeholders (U+E000-U+E01F)`,
        ),
      );
    }
  }

  try {
    return ok(matcherRegistry.create(strategy, mapping));
  } catch (error) {
    return err(new CompileError(`Failed to compile symbol matcher: ${errorMessage(error)}`, error));
  }
}
