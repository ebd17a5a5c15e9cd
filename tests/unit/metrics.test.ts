import { describe, it, expect, beforeEach } from 'vitest';
import { getMetricsSnapshot, recordTranspileMetrics, resetMetrics } from '../../src/observability/metrics';
import { withSpan } from '../../src/observability/tracing';

describe('transpile metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('counts runs by outcome', async () => {
    recordTranspileMetrics({
      timestamp: new Date().toISOString(),
      strategy: 'trie',
      outcome: 'blocked',
      inputChars: 12,
      substitutions: 0,
      protectedSpans: 1,
      skipped: false,
      bypassSecurity: false,
      durationMs: 2,
    });
    const snapshot = await getMetricsSnapshot();
    expect(snapshot).toContain('glyph_transpiler_runs_total{outcome="blocked",strategy="trie",bypass="false"} 1');
    expect(snapshot).toContain('glyph_transpiler_last_run_input_chars 12');
  });
});

describe('withSpan', () => {
  it('returns the wrapped result', async () => {
    await expect(withSpan('test', { attempt: 1 }, () => 42, (value) => ({ value }))).resolves.toBe(42);
  });

  it('rethrows failures', async () => {
    await expect(
      withSpan('test', undefined, () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});
