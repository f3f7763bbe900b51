// src/core/overlap/detector.ts
// Suffix/prefix overlaps between rule left-hand sides.

import type { Rule } from "../words/rule";
import { Word } from "../words/word";

/**
 * `first` ends with the same `length` symbols that `second` starts with.
 * "abc" and "bcd" overlap on "bc".
 */
export type Overlap = {
  first: Word;
  second: Word;
  length: number;
  overlap: Word;
};

export function describeOverlap(o: Overlap): string {
  return `${o.first.content} ∩ ${o.second.content} = '${o.overlap.content}' (len=${o.length})`;
}

export class OverlapDetector {
  /**
   * Longest ℓ with suffix_ℓ(s1) = prefix_ℓ(s2), scanning ℓ downward from
   * min(|s1|, |s2|). Undefined when no ℓ ≥ 1 works.
   */
  static findSuffixPrefixOverlap(s1: Word, s2: Word): Overlap | undefined {
    const max = Math.min(s1.length, s2.length);
    for (let len = max; len >= 1; len--) {
      const suffix = s1.content.slice(s1.length - len);
      if (s2.content.startsWith(suffix)) {
        return { first: s1, second: s2, length: len, overlap: Word.of(suffix) };
      }
    }
    return undefined;
  }

  /**
   * Maximal overlap for every ordered pair of distinct list positions, keeping
   * those of at least `minLength`.
   */
  static findAllOverlaps(patterns: readonly Word[], minLength = 1): Overlap[] {
    const out: Overlap[] = [];
    patterns.forEach((p1, i) => {
      patterns.forEach((p2, j) => {
        if (i === j) return;
        const o = OverlapDetector.findSuffixPrefixOverlap(p1, p2);
        if (o && o.length >= minLength) out.push(o);
      });
    });
    return out;
  }

  /** Largest pairwise left-side overlap; 0 when there is none. */
  static maxOverlap(rules: readonly Rule[]): number {
    const overlaps = OverlapDetector.findAllOverlaps(rules.map(r => r.left));
    return overlaps.reduce((m, o) => Math.max(m, o.length), 0);
  }

  /**
   * True iff no two distinct left sides overlap by more than `m` symbols.
   * Monotone in `m`.
   */
  static checkMLocality(rules: readonly Rule[], m: number): boolean {
    return OverlapDetector.maxOverlap(rules) <= m;
  }

  /**
   * Every word where a proper suffix of `a` is glued onto a prefix of `b`,
   * for each overlap length, shortest glue first. These are the sites where
   * an `a` match and a `b` match share symbols.
   */
  static superpositions(a: Word, b: Word): Word[] {
    const out: Word[] = [];
    const max = Math.min(a.length, b.length);
    for (let len = 1; len <= max; len++) {
      const suffix = a.content.slice(a.length - len);
      if (!b.content.startsWith(suffix)) continue;
      // b inside a's tail adds nothing new to a
      if (len === b.length && len < a.length) continue;
      out.push(Word.of(a.content + b.content.slice(len)));
    }
    return out;
  }
}
