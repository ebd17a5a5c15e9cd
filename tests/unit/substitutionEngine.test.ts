import { describe, it, expect } from 'vitest';
import { substituteSymbols } from '../../src/transpiler/engine';
import { compile } from '../../src/matcher/compiler';
import { ThreatDetector } from '../../src/security/threatDetector';
import { SecurityBlockedError } from '../../src/core/errors';
import type { CompiledMatcher } from '../../src/matcher/types';

function build(symbols: Record<string, string>): CompiledMatcher {
  const result = compile(new Map(Object.entries(symbols)));
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

const detector = new ThreatDetector();

describe('substituteSymbols', () => {
  it('replaces matches left to right and counts them', () => {
    const matcher = build({ 'λ': 'lambda', '→': 'return' });
    const result = substituteSymbols('λ x: → x', matcher, matcher.mapping, detector, false);
    expect(result).toEqual({
      ok: true,
      value: { text: 'lambda x: return x', substitutions: 2, bypassedThreats: [] },
    });
  });

  it('does not expand replacement text again', () => {
    const matcher = build({ a: 'b', b: 'c' });
    const result = substituteSymbols('a b', matcher, matcher.mapping, detector, false);
    expect(result.ok && result.value.text).toBe('b c');
  });

  it('returns the input for an empty matcher', () => {
    const matcher = build({});
    const result = substituteSymbols('λ x', matcher, matcher.mapping, detector, false);
    expect(result).toEqual({ ok: true, value: { text: 'λ x', substitutions: 0, bypassedThreats: [] } });
  });

  it('fails the whole call on a dangerous replacement', () => {
    const matcher = build({ 'λ': 'lambda', '⚡': 'eval(' });
    const result = substituteSymbols('λ ⚡', matcher, matcher.mapping, detector, false);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SecurityBlockedError);
      expect(result.error.symbol).toBe('⚡');
      expect(result.error.replacement).toBe('eval(');
      expect(result.error.pattern).toBe('eval(');
      expect(result.error.code).toBe('SECURITY_BLOCKED');
    }
  });

  it('records bypassed threats once per symbol', () => {
    const matcher = build({ 'λ': 'lambda', '⚡': 'eval(' });
    const result = substituteSymbols('⚡a) λ ⚡b)', matcher, matcher.mapping, detector, true);
    expect(result).toEqual({
      ok: true,
      value: {
        text: 'eval(a) lambda eval(b)',
        substitutions: 3,
        bypassedThreats: [{ symbol: '⚡', replacement: 'eval(', pattern: 'eval(' }],
      },
    });
  });

  it('treats a symbol missing from the mapping as a defect', () => {
    const matcher = build({ 'λ': 'lambda' });
    expect(() => substituteSymbols('λ', matcher, new Map(), detector, false)).toThrow(/not in the mapping/);
  });
});
