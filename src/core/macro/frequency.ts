// src/core/macro/frequency.ts

import { Word } from "../words/word";
import type { PatternCandidate, SccLike } from "./types";

/**
 * Mines recurring substrings of the members of one component.
 */
export class FrequencyAnalyzer {
  /** Every contiguous substring of length minLen..maxLen, shortest first. */
  static extractSubstrings(w: Word, minLen = 2, maxLen = 5): Word[] {
    const out: Word[] = [];
    for (let len = minLen; len <= maxLen; len++) {
      for (let i = 0; i + len <= w.length; i++) {
        out.push(w.slice(i, i + len));
      }
    }
    return out;
  }

  /**
   * Candidates with frequency ≥ minFrequency, by descending score.
   * Equal scores keep first-occurrence order (Array.prototype.sort is stable).
   */
  static analyzeScc(scc: SccLike, minLen = 2, maxLen = 4, minFrequency = 2): PatternCandidate[] {
    const members = scc.words;
    if (members.length === 0) return [];

    const counts = new Map<string, number>();
    for (const member of members) {
      for (const sub of FrequencyAnalyzer.extractSubstrings(member, minLen, maxLen)) {
        counts.set(sub.key, (counts.get(sub.key) ?? 0) + 1);
      }
    }

    const candidates: PatternCandidate[] = [];
    for (const [key, frequency] of counts) {
      if (frequency < minFrequency) continue;
      const pattern = Word.of(key);
      const containing = members.filter(m => m.includes(pattern)).length;
      const stability = containing / members.length;
      candidates.push({
        pattern,
        frequency,
        stability,
        score: frequency * stability * (1 + pattern.length * 0.1),
      });
    }

    return candidates.sort((a, b) => b.score - a.score);
  }
}
