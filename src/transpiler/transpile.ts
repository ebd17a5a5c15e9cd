import { TranspileError } from '../core/errors';
import { Result, err, ok } from '../core/result';
import type { CompiledMatcher } from '../matcher/types';
import { protectLiterals, restoreLiterals } from '../protection/literals';
import type { ThreatDetector, ThreatFinding } from '../security/threatDetector';
import { getLogger } from '../common/logger';
import { substituteSymbols } from './engine';

export interface TranspileReport {
  output: string;
  substitutions: number;
  protectedSpans: number;
  /** True when the prefilter ruled out every symbol and the pipeline was not run. */
  skipped: boolean;
  bypassedThreats: ThreatFinding[];
}

const log = getLogger('transpiler');

export function transpileWithReport(
  source: string,
  matcher: CompiledMatcher,
  detector: ThreatDetector,
  bypassSecurity: boolean,
): Result<TranspileReport, TranspileError> {
  if (!matcher.mayContainSymbols(source)) {
    log.debug('No symbol characters in input, skipping', { length: source.length });
    return ok({ output: source, substitutions: 0, protectedSpans: 0, skipped: true, bypassedThreats: [] });
  }

  const protectedSource = protectLiterals(source);
  const substituted = substituteSymbols(protectedSource.text, matcher, matcher.mapping, detector, bypassSecurity);
  if (!substituted.ok) {
    log.debug('Substitution blocked', { symbol: substituted.error.symbol, pattern: substituted.error.pattern });
    return substituted;
  }

  const restored = restoreLiterals(substituted.value.text, protectedSource.spans);
  if (!restored.ok) {
    return err(restored.error);
  }

  log.debug('Transpiled input', {
    length: source.length,
    substitutions: substituted.value.substitutions,
    protectedSpans: protectedSource.spans.length,
  });

  return ok({
    output: restored.value,
    substitutions: substituted.value.substitutions,
    protectedSpans: protectedSource.spans.length,
    skipped: false,
    bypassedThreats: substituted.value.bypassedThreats,
  });
}

export function transpile(
  source: string,
  matcher: CompiledMatcher,
  detector: ThreatDetector,
  bypassSecurity: boolean,
): Result<string, TranspileError> {
  const report = transpileWithReport(source, matcher, detector, bypassSecurity);
  return report.ok ? ok(report.value.output) : report;
}
