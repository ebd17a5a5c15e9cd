export * from './core/errors';
export * from './core/result';
export * from './core/mapping';
export { compile, DEFAULT_STRATEGY } from './matcher/compiler';
export { MatcherRegistry, matcherRegistry } from './matcher/registry';
export { RegexSymbolMatcher } from './matcher/regex';
export { TrieSymbolMatcher } from './matcher/trie';
export type { CompiledMatcher, CompileOptions, MatcherFactory, MatcherStrategy, SymbolMatch } from './matcher/types';
export { protectLiterals, restoreLiterals } from './protection/literals';
export type { LiteralKind, ProtectedSource, ProtectedSpan } from './protection/literals';
export {
  DEFAULT_THREAT_PATTERNS,
  ThreatDetector,
  defaultThreatDetector,
  isDangerous,
  mergeThreatPatterns,
} from './security/threatDetector';
export type { ThreatFinding } from './security/threatDetector';
export { substituteSymbols } from './transpiler/engine';
export type { SubstitutionOutcome } from './transpiler/engine';
export { transpile, transpileWithReport } from './transpiler/transpile';
export type { TranspileReport } from './transpiler/transpile';
export { SymbolTranspiler, createTranspiler } from './transpiler/transpiler';
export type { TranspileCallOptions, TranspilerOptions } from './transpiler/transpiler';
export { loadConfig, parseSymbolsJson, resolveConfig } from './config';
export type { ResolvedConfig, TranspilerConfig } from './config';
export { Logger, configureLogger, getLogger } from './common/logger';
export type { LogFormat, LogLevel, LoggerOptions } from './common/logger';
