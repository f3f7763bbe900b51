// src/core/macro/lifter.ts
// Mines candidates from attractors, verifies them, admits the survivors.

import type { Rule } from "../words/rule";
import type { Word } from "../words/word";
import type { Sym } from "../words/symbol";
import type { Component } from "../graph/scc";
import { isFail } from "../../outcome/outcome";
import { DEFAULT_MACRO_CONFIG, type MacroConfig } from "../config/config";
import { makeId, type TraceSink } from "../../ports/types";
import { nullTraceSink } from "../../adapters/logging";
import { createMacro, type Macro } from "./macro";
import type { MacroDictionary } from "./dictionary";
import { FrequencyAnalyzer } from "./frequency";
import { LocalConfluenceChecker } from "./confluence";
import { BoundedBisimulation } from "./bisimulation";
import type { BisimulationResult, ConfluenceResult, MacroStatus, PatternCandidate } from "./types";

/**
 * The two checks a macro must pass, against `system` (the original rules
 * plus every admitted macro's rules).
 */
export interface MacroVerifier {
  confluence(system: readonly Rule[], macro: Macro): ConfluenceResult;
  bisimulation(system: readonly Rule[], macro: Macro): BisimulationResult;
}

export function boundedVerifier(config: MacroConfig = DEFAULT_MACRO_CONFIG): MacroVerifier {
  return {
    confluence: (system, macro) =>
      LocalConfluenceChecker.check(system, macro, config.confluenceDepth, {
        width: config.confluenceWidth,
        maxCriticalStrings: config.maxCriticalStrings,
      }),
    bisimulation: (system, macro) =>
      BoundedBisimulation.check(system, macro, config.bisimulationLength, config.bisimulationDepth, {
        width: config.bisimulationWidth,
        samples: config.bisimulationSamples,
      }),
  };
}

export type CandidateOutcome = {
  candidate: PatternCandidate;
  symbol?: string;
  /** Every state the candidate went through, starting with "proposed" */
  transitions: MacroStatus[];
  status: "admitted" | "rejected";
  reason?: string;
  confluence?: ConfluenceResult;
  bisimulation?: BisimulationResult;
  /** Dictionary version after admission */
  version?: number;
};

export type LiftReport = {
  outcomes: CandidateOutcome[];
  admitted: Macro[];
  rejected: number;
  /** Dictionary version when lifting finished */
  version: number;
};

export type MacroLifterOptions = {
  config?: Partial<MacroConfig>;
  verifier?: MacroVerifier;
  trace?: TraceSink;
};

/**
 * Runs proposed → confluence-checked → bisimulation-checked → admitted for
 * each candidate, stopping at rejected on the first failed step.
 *
 * Candidates are verified and admitted one at a time, each against the system
 * as it stands after the previous admission.
 */
export class MacroLifter {
  readonly config: MacroConfig;
  private readonly verifier: MacroVerifier;
  private readonly trace: TraceSink;

  constructor(
    readonly rules: readonly Rule[],
    readonly dictionary: MacroDictionary,
    opts: MacroLifterOptions = {}
  ) {
    this.config = { ...DEFAULT_MACRO_CONFIG, ...opts.config };
    this.verifier = opts.verifier ?? boundedVerifier(this.config);
    this.trace = opts.trace ?? nullTraceSink;
  }

  /** Original rules followed by the rules of every admitted macro. */
  system(): Rule[] {
    return [...this.rules, ...this.dictionary.macros.flatMap(m => m.rules)];
  }

  /**
   * Candidates from every attractor with at least `minSccSize` members,
   * attractor by attractor. A pattern seen twice keeps its first entry;
   * patterns already in the dictionary are skipped.
   */
  candidates(components: readonly Component[]): PatternCandidate[] {
    const { minSccSize, minPatternLength, maxPatternLength, minFrequency, maxCandidates } = this.config;
    const seen = new Set<string>();
    const out: PatternCandidate[] = [];

    for (const c of components) {
      if (!c.isAttractor || c.size < minSccSize) continue;
      for (const cand of FrequencyAnalyzer.analyzeScc(c, minPatternLength, maxPatternLength, minFrequency)) {
        if (seen.has(cand.pattern.key) || this.dictionary.findByDefinition(cand.pattern)) continue;
        seen.add(cand.pattern.key);
        out.push(cand);
      }
    }

    const picked = out.slice(0, maxCandidates);
    for (const cand of picked) {
      this.trace.emit({
        tag: "E_CandidateMined",
        id: makeId("candidate"),
        pattern: cand.pattern.content,
        frequency: cand.frequency,
        score: cand.score,
      });
    }
    return picked;
  }

  lift(components: readonly Component[]): LiftReport {
    return this.liftCandidates(this.candidates(components));
  }

  liftCandidates(candidates: readonly PatternCandidate[]): LiftReport {
    const outcomes = candidates.map(c => this.liftOne(c));
    return {
      outcomes,
      admitted: this.dictionary.macros.filter(m => outcomes.some(o => o.status === "admitted" && o.symbol === m.symbol.value)),
      rejected: outcomes.filter(o => o.status === "rejected").length,
      version: this.dictionary.version,
    };
  }

  private liftOne(candidate: PatternCandidate): CandidateOutcome {
    const transitions: MacroStatus[] = ["proposed"];
    const reject = (reason: string, extra: Partial<CandidateOutcome> = {}): CandidateOutcome => {
      transitions.push("rejected");
      this.trace.emit({
        tag: "E_MacroRejected",
        id: makeId("macro"),
        symbol: extra.symbol ?? "",
        definition: candidate.pattern.content,
        reason,
      });
      return { candidate, transitions, status: "rejected", reason, ...extra };
    };

    const symbol = this.freshSymbol();
    if (!symbol) return reject("no fresh symbol left");

    const created = createMacro(symbol, candidate.pattern, {
      source: "frequency-analysis",
      frequency: candidate.frequency,
      stability: candidate.stability,
      score: candidate.score,
    });
    if (isFail(created)) return reject(created.failure.message, { symbol: symbol.value });
    const macro = created.value;

    const versionBefore = this.dictionary.version;
    const system = this.system();

    const confluence = this.verifier.confluence(system, macro);
    this.trace.emit({
      tag: "E_ConfluenceChecked",
      id: makeId("confluence"),
      symbol: symbol.value,
      ok: confluence.tag === "Confluent",
      tested: confluence.tag === "Confluent" ? confluence.tested : 0,
    });
    if (confluence.tag === "Divergent") {
      return reject(`not locally confluent at ${describeWord(confluence.source)}`, { symbol: symbol.value, confluence });
    }
    transitions.push("confluence-checked");

    const bisimulation = this.verifier.bisimulation(system, macro);
    this.trace.emit({
      tag: "E_BisimulationChecked",
      id: makeId("bisimulation"),
      symbol: symbol.value,
      ok: bisimulation.tag === "Equivalent",
      tested: bisimulation.tag === "Equivalent" ? bisimulation.tested : 0,
    });
    if (bisimulation.tag === "Diverged") {
      return reject(`behaviour diverged from ${describeWord(bisimulation.word)}`, {
        symbol: symbol.value,
        confluence,
        bisimulation,
      });
    }
    transitions.push("bisimulation-checked");

    const admitted = this.dictionary.admit(macro.markVerified(), versionBefore);
    if (isFail(admitted)) {
      return reject(admitted.failure.message, { symbol: symbol.value, confluence, bisimulation });
    }
    transitions.push("admitted");
    this.trace.emit({
      tag: "E_MacroAdmitted",
      id: makeId("macro"),
      symbol: symbol.value,
      definition: macro.definition.content,
      version: admitted.value,
    });
    return {
      candidate,
      symbol: symbol.value,
      transitions,
      status: "admitted",
      confluence,
      bisimulation,
      version: admitted.value,
    };
  }

  /** First pool symbol not used by the rules or the dictionary. */
  private freshSymbol(): Sym | undefined {
    const alphabet = this.dictionary.alphabet();
    for (const r of this.rules) {
      for (const s of [...r.left.symbols(), ...r.right.symbols()]) alphabet.add(s);
    }
    return alphabet.freshSymbol();
  }
}

function describeWord(w: Word): string {
  return w.isEmpty() ? "ε" : `"${w.content}"`;
}
