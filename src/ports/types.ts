/**
 * Trace event types emitted by the analysis pipeline.
 */
export type TraceEvent =
  | { tag: "E_GraphBuilt"; id: string; mode: "full" | "incremental"; vertices: number; edges: number; durationMs: number }
  | { tag: "E_SccComputed"; id: string; components: number; attractors: number; durationMs: number }
  | { tag: "E_CandidateMined"; id: string; pattern: string; frequency: number; score: number }
  | { tag: "E_ConfluenceChecked"; id: string; symbol: string; ok: boolean; tested: number }
  | { tag: "E_BisimulationChecked"; id: string; symbol: string; ok: boolean; tested: number }
  | { tag: "E_MacroAdmitted"; id: string; symbol: string; definition: string; version: number }
  | { tag: "E_MacroRejected"; id: string; symbol: string; definition: string; reason: string }
  | { tag: "E_ExpansionCapped"; id: string; iterations: number; remaining: number }
  | { tag: "E_DictionarySaved"; id: string; location: string; version: number; durationMs: number }
  | { tag: "E_DictionaryLoaded"; id: string; location: string; found: boolean; durationMs: number }
  | { tag: "E_AnalysisFinished"; id: string; initial: string; durationMs: number };

export type TraceTag = TraceEvent["tag"];

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/**
 * Context handed to components that log.
 */
export interface TraceContext {
  /** Correlation ID for the whole analysis run */
  runId: string;

  /** Trace event sink */
  trace: TraceSink;
}

export function traceContext(trace: TraceSink, runId = makeId("run")): TraceContext {
  return { runId, trace };
}

export function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}
