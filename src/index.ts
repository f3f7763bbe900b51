// src/index.ts
// tally-rewrite - Public API
//
// String rewriting over {0, |}, configuration graphs, attractors, overlaps
// and verified macro lifting, as library calls.

// ═══════════════════════════════════════════════════════════════════════════════
// WORDS & RULES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Sym,
  UNIT,
  SEPARATOR,
  BASE_SYMBOLS,
  isBaseSymbol,
  Word,
  word,
  words,
  Alphabet,
  MACRO_SYMBOL_POOL,
  Rule,
  type RuleMetadata,
  parseRule,
  parseRules,
  leftSides,
  RuleSet,
  type RuleMatch,
  type Context,
  contextAt,
  extractMatch,
  describeContext,
} from "./core/words";

// ═══════════════════════════════════════════════════════════════════════════════
// REWRITING ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  RewritingEngine,
  reachedWords,
  type Application,
  type ReachLevels,
  type PathResult,
  type LimitResult,
  limitWords,
  isFound,
} from "./core/rewriting";

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH, SCC & ATTRACTORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Graph,
  type GraphData,
  type VertexId,
  GraphBuilder,
  type GraphBuilderOptions,
  Component,
  TarjanScc,
  findSccs,
  AttractorAnalyzer,
} from "./core/graph";

// ═══════════════════════════════════════════════════════════════════════════════
// OVERLAPS
// ═══════════════════════════════════════════════════════════════════════════════

export { AhoCorasick, type PatternMatch, OverlapDetector, type Overlap, describeOverlap } from "./core/overlap";

// ═══════════════════════════════════════════════════════════════════════════════
// MACROS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/macro";

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  analyzeSystem,
  AnalysisReport,
  type AnalysisOptions,
  type AttractorSummary,
  type GraphStats,
} from "./core/analysis";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export { failure, wrapFailure, isFailureReason, allDiagnostics } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity, WordSpan } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export type { TraceEvent, TraceTag, TraceSink, TraceContext } from "./ports/types";
export { traceContext } from "./ports/types";
export {
  nullTraceSink,
  memoryTraceSink,
  consoleTraceSink,
  teeTraceSink,
  loggingStore,
  type MemoryTraceSink,
} from "./adapters/logging";
