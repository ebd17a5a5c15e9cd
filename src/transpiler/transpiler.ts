import { CompileError, MappingError, TranspileError, errorMessage } from '../core/errors';
import { SymbolEntries, buildSymbolMapping } from '../core/mapping';
import { Result, err, ok } from '../core/result';
import { compile } from '../matcher/compiler';
import type { CompiledMatcher, MatcherStrategy } from '../matcher/types';
import { ThreatDetector, ThreatFinding, mergeThreatPatterns } from '../security/threatDetector';
import { TranspileReport, transpileWithReport } from './transpile';

export interface TranspilerOptions {
  strategy?: MatcherStrategy;
  /** Added to the default denylist. */
  threatPatterns?: readonly string[];
}

export interface TranspileCallOptions {
  bypassSecurity?: boolean;
}

export class SymbolTranspiler {
  constructor(
    readonly matcher: CompiledMatcher,
    readonly detector: ThreatDetector,
  ) {}

  get strategy(): MatcherStrategy {
    return this.matcher.strategy;
  }

  transpile(source: string, options: TranspileCallOptions = {}): Result<TranspileReport, TranspileError> {
    return transpileWithReport(source, this.matcher, this.detector, options.bypassSecurity ?? false);
  }

  /** Mapping entries whose replacement would be blocked. */
  audit(): ThreatFinding[] {
    const findings: ThreatFinding[] = [];
    for (const symbol of this.matcher.symbols) {
      const replacement = this.matcher.mapping.get(symbol) ?? '';
      const pattern = this.detector.findThreat(replacement);
      if (pattern !== undefined) {
        findings.push({ symbol, replacement, pattern });
      }
    }
    return findings;
  }
}

export function createTranspiler(
  symbols: Readonly<Record<string, unknown>> | SymbolEntries,
  options: TranspilerOptions = {},
): Result<SymbolTranspiler, MappingError | CompileError> {
  const mapping = buildSymbolMapping(symbols);
  if (!mapping.ok) {
    return mapping;
  }
  const matcher = compile(mapping.value, { strategy: options.strategy });
  if (!matcher.ok) {
    return matcher;
  }
  let detector: ThreatDetector;
  try {
    detector = new ThreatDetector(mergeThreatPatterns(options.threatPatterns));
  } catch (error) {
    return err(new CompileError(`Invalid threat patterns: ${errorMessage(error)}`, error));
  }
  return ok(new SymbolTranspiler(matcher.value, detector));
}
