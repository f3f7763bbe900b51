// src/core/macro/confluence.ts
// Bounded local-confluence check for a system extended by one macro.

import type { Rule } from "../words/rule";
import type { Word } from "../words/word";
import { RewritingEngine, reachedWords } from "../rewriting/engine";
import { OverlapDetector } from "../overlap/detector";
import type { Macro } from "./macro";
import type { ConfluenceResult } from "./types";

export type ConfluenceOptions = {
  /** Applications expanded per word while searching for a common descendant */
  width?: number;
  /** Critical strings tested, taken from the front of the list */
  maxCriticalStrings?: number;
};

/**
 * Checks that divergent one-step rewrites of candidate critical strings can
 * be rejoined within `searchDepth` steps.
 *
 * The candidate strings are a syntactic over-approximation of the real
 * critical pairs, and only the first two applications of each are compared.
 * A Confluent result is evidence, not a proof.
 */
export class LocalConfluenceChecker {
  static check(
    originalRules: readonly Rule[],
    macro: Macro,
    searchDepth = 5,
    opts: ConfluenceOptions = {}
  ): ConfluenceResult {
    const width = opts.width ?? 50;
    const limit = opts.maxCriticalStrings ?? 20;
    const rules = [...originalRules, ...macro.rules];
    const engine = new RewritingEngine(rules);

    const candidates = LocalConfluenceChecker.criticalStrings(rules).slice(0, limit);
    for (const source of candidates) {
      const apps = engine.allApplications(source);
      const [first, second] = apps;
      if (!first || !second) continue;
      if (first.result.equals(second.result)) continue;

      if (!LocalConfluenceChecker.joinable(engine, first.result, second.result, searchDepth, width)) {
        return { tag: "Divergent", source, left: first.result, right: second.result };
      }
    }

    return { tag: "Confluent", tested: candidates.length };
  }

  /**
   * Pairwise left-side concatenations (outer rule first), then the left sides
   * themselves, then every suffix/prefix superposition of two left sides.
   */
  static criticalStrings(rules: readonly Rule[]): Word[] {
    const out: Word[] = [];
    for (const r1 of rules) {
      for (const r2 of rules) out.push(r1.left.concat(r2.left));
    }
    for (const r of rules) out.push(r.left);
    for (const r1 of rules) {
      for (const r2 of rules) out.push(...OverlapDetector.superpositions(r1.left, r2.left));
    }
    return out;
  }

  /** A word reachable from both within `depth` steps. */
  static joinable(engine: RewritingEngine, a: Word, b: Word, depth: number, width: number): boolean {
    const fromA = new Set(reachedWords(engine.boundedReach(a, depth, width)).map(w => w.key));
    return reachedWords(engine.boundedReach(b, depth, width)).some(w => fromA.has(w.key));
  }
}
