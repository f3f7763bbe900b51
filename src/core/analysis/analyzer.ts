// src/core/analysis/analyzer.ts
// One-call analysis of a rule system from an initial word.

import type { Rule } from "../words/rule";
import type { Word } from "../words/word";
import { leftSides } from "../words/rule";
import { RewritingEngine, reachedWords } from "../rewriting/engine";
import { limitWords, type LimitResult } from "../rewriting/types";
import { GraphBuilder } from "../graph/builder";
import { TarjanScc, type Component } from "../graph/scc";
import { AttractorAnalyzer } from "../graph/attractors";
import { OverlapDetector, type Overlap } from "../overlap/detector";
import { MacroDictionary } from "../macro/dictionary";
import { MacroLifter, type LiftReport, type MacroVerifier } from "../macro/lifter";
import { mergeConfigs, type PartialTallyConfig, type TallyConfig } from "../config/config";
import { makeId, type TraceSink } from "../../ports/types";
import { nullTraceSink } from "../../adapters/logging";

export type AnalysisOptions = {
  config?: PartialTallyConfig;
  /** "incremental" explores from the initial word; "full" enumerates G_L */
  graphMode?: "incremental" | "full";
  /** Dictionary to lift into; a fresh one when absent */
  dictionary?: MacroDictionary;
  verifier?: MacroVerifier;
  trace?: TraceSink;
};

export type AttractorSummary = {
  members: Word[];
  basinSize: number;
};

export type GraphStats = {
  mode: "incremental" | "full";
  vertices: number;
  edges: number;
  components: number;
  attractors: number;
  largestComponent: number;
};

/**
 * Everything one run found. Search results are bounded: `reachable` is only
 * what the BFS saw within the configured depth and width.
 */
export class AnalysisReport {
  constructor(
    readonly rules: readonly Rule[],
    readonly initial: Word,
    readonly config: TallyConfig,
    readonly reachable: readonly Word[],
    readonly normalForms: readonly Word[],
    readonly limit: LimitResult,
    readonly graph: GraphStats,
    readonly attractors: readonly AttractorSummary[],
    readonly overlaps: readonly Overlap[],
    readonly maxOverlap: number,
    readonly lift: LiftReport,
    readonly dictionary: MacroDictionary,
    /** Fraction of reachable words containing an admitted definition */
    readonly macroCoverage: number,
    readonly durationMs: number
  ) {}

  toJSON() {
    return {
      rules: this.rules.map(r => r.toString()),
      initial: this.initial.content,
      rewriting: {
        reachable: this.reachable.length,
        normalForms: this.normalForms.map(w => w.content),
        limit: { kind: this.limit.tag, words: limitWords(this.limit).map(w => w.content) },
      },
      graph: this.graph,
      attractors: this.attractors.map(a => ({
        members: a.members.map(w => w.content),
        basinSize: a.basinSize,
      })),
      overlaps: {
        pairs: this.overlaps.length,
        max: this.maxOverlap,
      },
      macros: {
        admitted: this.lift.admitted.map(m => m.describe()),
        rejected: this.lift.rejected,
        version: this.dictionary.version,
        coverage: this.macroCoverage,
      },
      durationMs: this.durationMs,
    };
  }
}

export function analyzeSystem(rules: readonly Rule[], initial: Word, opts: AnalysisOptions = {}): AnalysisReport {
  const started = Date.now();
  const config = mergeConfigs(opts.config ?? {});
  const trace = opts.trace ?? nullTraceSink;
  const mode = opts.graphMode ?? "incremental";
  const engine = new RewritingEngine(rules);

  // Rewriting
  const reachable = reachedWords(engine.boundedReach(initial, config.search.depth, config.search.width));
  const normalForms = engine.normalForms(reachable);
  const limit = engine.omegaLimit(initial, config.search.limitMaxSteps, config.search.limitWindow);

  // Graph and components
  const builder = new GraphBuilder(engine, { trace });
  const graph =
    mode === "full"
      ? builder.buildGraph(config.graph.maxLength)
      : builder.buildIncremental([initial], config.graph.incrementalDepth);
  const components = new TarjanScc(graph, { trace }).findSccs();
  const analyzer = new AttractorAnalyzer(graph, components);

  // Overlaps
  const overlaps = OverlapDetector.findAllOverlaps(leftSides(rules));
  const maxOverlap = overlaps.reduce((m, o) => Math.max(m, o.length), 0);

  // Macros
  const dictionary = opts.dictionary ?? new MacroDictionary({ expansionCap: config.macros.expansionCap, trace });
  const lifter = new MacroLifter(rules, dictionary, { config: config.macros, verifier: opts.verifier, trace });
  const lift = lifter.lift(components);
  const covered = reachable.filter(w => dictionary.covers(w)).length;

  const durationMs = Date.now() - started;
  trace.emit({ tag: "E_AnalysisFinished", id: makeId("analysis"), initial: initial.content, durationMs });

  return new AnalysisReport(
    rules,
    initial,
    config,
    reachable,
    normalForms,
    limit,
    graphStats(mode, graph.vertexCount, graph.edgeCount, components),
    analyzer.attractors.map(a => ({ members: [...a.words], basinSize: analyzer.basinIds(a).size })),
    overlaps,
    maxOverlap,
    lift,
    dictionary,
    reachable.length === 0 ? 0 : covered / reachable.length,
    durationMs
  );
}

function graphStats(
  mode: GraphStats["mode"],
  vertices: number,
  edges: number,
  components: readonly Component[]
): GraphStats {
  return {
    mode,
    vertices,
    edges,
    components: components.length,
    attractors: components.filter(c => c.isAttractor).length,
    largestComponent: components.reduce((m, c) => Math.max(m, c.size), 0),
  };
}
