/**
 * Substrings that mark a replacement as able to run code, reach the OS or
 * introspect the runtime. Matched case-sensitively, without word boundaries.
 */
export const DEFAULT_THREAT_PATTERNS: readonly string[] = Object.freeze([
  'eval(',
  'eval (',
  'exec(',
  'exec (',
  'compile(',
  'compile (',
  'getattr(__builtins__',
  'getattr(__builtins__,',
  'globals(',
  'globals (',
  'locals(',
  'locals (',
  'os.system(',
  'os.system (',
  'subprocess.',
  '__import__',
  'vars(',
  'vars (',
  'dir(',
  'dir (',
  'open(',
  'open (',
  'input(',
  'raw_input(',
]);

export interface ThreatFinding {
  symbol: string;
  replacement: string;
  pattern: string;
}

export class ThreatDetector {
  private readonly patterns: readonly string[];

  constructor(patterns: readonly string[] = DEFAULT_THREAT_PATTERNS) {
    for (const pattern of patterns) {
      if (pattern.length === 0) {
        throw new Error('Threat patterns must be non-empty strings');
      }
    }
    this.patterns = Object.freeze([...patterns]);
  }

  get size(): number {
    return this.patterns.length;
  }

  listPatterns(): readonly string[] {
    return this.patterns;
  }

  /** First denylisted substring found in `text`, if any. */
  findThreat(text: string): string | undefined {
    return this.patterns.find((pattern) => text.includes(pattern));
  }

  isDangerous(text: string): boolean {
    return this.findThreat(text) !== undefined;
  }
}

export function mergeThreatPatterns(custom?: readonly string[]): readonly string[] {
  if (!custom || custom.length === 0) {
    return DEFAULT_THREAT_PATTERNS;
  }
  return [...new Set([...DEFAULT_THREAT_PATTERNS, ...custom])];
}

export const defaultThreatDetector = new ThreatDetector();

export function isDangerous(text: string): boolean {
  return defaultThreatDetector.isDangerous(text);
}
