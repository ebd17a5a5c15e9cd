import { SecurityBlockedError } from '../core/errors';
import type { SymbolMapping } from '../core/mapping';
import { Result, err, ok } from '../core/result';
import type { CompiledMatcher } from '../matcher/types';
import type { ThreatDetector, ThreatFinding } from '../security/threatDetector';

export interface SubstitutionOutcome {
  text: string;
  substitutions: number;
  bypassedThreats: ThreatFinding[];
}

/**
 * Replaces every match left to right. Replacement text is emitted as-is and
 * never rescanned. Without `bypassSecurity` the first dangerous replacement
 * fails the whole call.
 */
export function substituteSymbols(
  text: string,
  matcher: CompiledMatcher,
  mapping: SymbolMapping,
  detector: ThreatDetector,
  bypassSecurity: boolean,
): Result<SubstitutionOutcome, SecurityBlockedError> {
  if (matcher.isEmpty()) {
    return ok({ text, substitutions: 0, bypassedThreats: [] });
  }

  // symbol -> matched denylist entry, or null when the replacement is safe
  const verdicts = new Map<string, string | null>();
  const bypassedThreats: ThreatFinding[] = [];
  let output = '';
  let cursor = 0;
  let substitutions = 0;

  for (const match of matcher.findAll(text)) {
    const replacement = mapping.get(match.symbol);
    if (replacement === undefined) {
      throw new Error(`Matcher reported symbol ${JSON.stringify(match.symbol)} that is not in the mapping`);
    }

    let threat = verdicts.get(match.symbol);
    if (threat === undefined) {
      threat = detector.findThreat(replacement) ?? null;
      verdicts.set(match.symbol, threat);
      if (threat !== null && bypassSecurity) {
        bypassedThreats.push({ symbol: match.symbol, replacement, pattern: threat });
      }
    }
    if (threat !== null && !bypassSecurity) {
      return err(new SecurityBlockedError(match.symbol, replacement, threat));
    }

    output += text.slice(cursor, match.start) + replacement;
    cursor = match.end;
    substitutions += 1;
  }

  return ok({ text: output + text.slice(cursor), substitutions, bypassedThreats });
}
