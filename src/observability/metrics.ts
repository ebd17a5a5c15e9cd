import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type TranspileOutcome = 'success' | 'blocked' | 'failed';

export interface TranspileRunMetrics {
  timestamp: string;
  strategy: string;
  outcome: TranspileOutcome;
  inputChars: number;
  substitutions: number;
  protectedSpans: number;
  skipped: boolean;
  bypassSecurity: boolean;
  durationMs: number;
}

const registry = new Registry();

const runCounter = new Counter({
  name: 'glyph_transpiler_runs_total',
  help: 'Number of transpile runs by outcome',
  labelNames: ['outcome', 'strategy', 'bypass'],
  registers: [registry],
});

const runDuration = new Histogram({
  name: 'glyph_transpiler_run_duration_seconds',
  help: 'Duration of transpile runs in seconds',
  labelNames: ['strategy'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

const substitutionsGauge = new Gauge({
  name: 'glyph_transpiler_last_run_substitutions',
  help: 'Symbols substituted in the last run',
  registers: [registry],
});

const inputGauge = new Gauge({
  name: 'glyph_transpiler_last_run_input_chars',
  help: 'Input length in UTF-16 code units of the last run',
  registers: [registry],
});

const skippedCounter = new Counter({
  name: 'glyph_transpiler_prefilter_skips_total',
  help: 'Runs skipped because no symbol could occur in the input',
  registers: [registry],
});

export function recordTranspileMetrics(metrics: TranspileRunMetrics): void {
  runCounter.inc({
    outcome: metrics.outcome,
    strategy: metrics.strategy,
    bypass: metrics.bypassSecurity ? 'true' : 'false',
  });
  runDuration.observe({ strategy: metrics.strategy }, metrics.durationMs / 1000);
  substitutionsGauge.set(metrics.substitutions);
  inputGauge.set(metrics.inputChars);
  if (metrics.skipped) {
    skippedCounter.inc();
  }
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}

export function resetMetrics(): void {
  registry.resetMetrics();
}
