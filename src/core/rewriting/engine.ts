// src/core/rewriting/engine.ts
// Nondeterministic, position-exhaustive string rewriting.

import type { Rule } from "../words/rule";
import { Word } from "../words/word";
import type { Application, LimitResult, PathResult, ReachLevels } from "./types";

type QueueItem = { word: Word; level: number };

/**
 * Applies a fixed, ordered rule list to words.
 *
 * The one-step image of a word is every (rule, position) pair whose left side
 * matches, overlapping matches included, ordered by rule then position. That
 * order is part of the contract: width-bounded searches and the confluence
 * sampler take "the first N" applications.
 *
 * "No rule applies" is not an error; it is the normal-form condition and shows
 * up as an empty application list.
 */
export class RewritingEngine {
  readonly rules: readonly Rule[];

  constructor(rules: Iterable<Rule>) {
    this.rules = [...rules];
  }

  /** A new engine over these rules followed by `extra`. */
  extend(extra: Iterable<Rule>): RewritingEngine {
    return new RewritingEngine([...this.rules, ...extra]);
  }

  /**
   * Every start index of `pattern` in `word`, overlapping occurrences included.
   */
  findPositions(word: Word, pattern: Word): number[] {
    const positions: number[] = [];
    if (pattern.isEmpty()) {
      for (let i = 0; i <= word.length; i++) positions.push(i);
      return positions;
    }
    let pos = word.indexOf(pattern);
    while (pos >= 0) {
      positions.push(pos);
      pos = word.indexOf(pattern, pos + 1);
    }
    return positions;
  }

  /**
   * Splice `rule.right` over the `rule.left`-sized slice at `position`.
   * Does not check that the slice actually matches.
   */
  applyRule(word: Word, rule: Rule, position: number): Word {
    if (position < 0 || position + rule.left.length > word.length) {
      throw new RangeError(`Position ${position} out of range for ${rule.id} on "${word.content}"`);
    }
    const s = word.content;
    return Word.of(s.slice(0, position) + rule.right.content + s.slice(position + rule.left.length));
  }

  allApplications(word: Word): Application[] {
    const apps: Application[] = [];
    for (const rule of this.rules) {
      for (const position of this.findPositions(word, rule.left)) {
        apps.push({ result: this.applyRule(word, rule, position), rule, position });
      }
    }
    return apps;
  }

  /** First application in engine order, without building the full image. */
  firstApplication(word: Word): Application | undefined {
    for (const rule of this.rules) {
      const position = rule.left.isEmpty() ? 0 : word.indexOf(rule.left);
      if (position >= 0) {
        return { result: this.applyRule(word, rule, position), rule, position };
      }
    }
    return undefined;
  }

  /** Distinct one-step successors, in application order. */
  successors(word: Word): Word[] {
    const seen = new Set<string>();
    const out: Word[] = [];
    for (const app of this.allApplications(word)) {
      if (seen.has(app.result.key)) continue;
      seen.add(app.result.key);
      out.push(app.result);
    }
    return out;
  }

  isNormalForm(word: Word): boolean {
    return this.firstApplication(word) === undefined;
  }

  normalForms(candidates: Iterable<Word>): Word[] {
    const out: Word[] = [];
    for (const w of candidates) {
      if (this.isNormalForm(w)) out.push(w);
    }
    return out;
  }

  /**
   * Breadth-first exploration up to `depth` levels.
   *
   * `width` is a sampling bound, not a completeness guarantee: a word with more
   * than `width` applications only has its first `width` expanded.
   * Already-visited words are never re-added, so cycles end the search.
   */
  boundedReach(start: Word, depth: number, width?: number): ReachLevels {
    const levels: ReachLevels = new Map([[0, [start]]]);
    const visited = new Set<string>([start.key]);
    const queue: QueueItem[] = [{ word: start, level: 0 }];
    let head = 0;

    while (head < queue.length) {
      const item = queue[head++];
      if (!item || item.level >= depth) continue;

      for (const app of this.sample(item.word, width)) {
        if (visited.has(app.result.key)) continue;
        visited.add(app.result.key);

        const next = item.level + 1;
        const bucket = levels.get(next) ?? [];
        bucket.push(app.result);
        levels.set(next, bucket);
        queue.push({ word: app.result, level: next });
      }
    }

    return levels;
  }

  /**
   * Same search as boundedReach, stopping at the first path to `target`.
   */
  reachable(start: Word, target: Word, depth: number, width?: number): PathResult {
    if (start.equals(target)) return { tag: "Found", path: [start] };

    const parent = new Map<string, Word | undefined>([[start.key, undefined]]);
    const queue: QueueItem[] = [{ word: start, level: 0 }];
    let head = 0;

    while (head < queue.length) {
      const item = queue[head++];
      if (!item || item.level >= depth) continue;

      for (const app of this.sample(item.word, width)) {
        if (app.result.equals(target)) {
          return { tag: "Found", path: [...tracePath(parent, item.word), app.result] };
        }
        if (parent.has(app.result.key)) continue;
        parent.set(app.result.key, item.word);
        queue.push({ word: app.result, level: item.level + 1 });
      }
    }

    return { tag: "NotFound", explored: parent.size };
  }

  /**
   * Follow the first application only, until a word repeats or no rule applies.
   * Without a repeat inside `maxSteps`, the last `window` states come back
   * tagged `Approximate`.
   */
  omegaLimit(start: Word, maxSteps = 1000, window = 100): LimitResult {
    const trajectory: Word[] = [];
    const firstSeen = new Map<string, number>();
    let current = start;

    for (let step = 0; step < maxSteps; step++) {
      firstSeen.set(current.key, trajectory.length);
      trajectory.push(current);

      const app = this.firstApplication(current);
      if (!app) return { tag: "Terminal", word: current, steps: step };

      current = app.result;
      const entry = firstSeen.get(current.key);
      if (entry !== undefined) {
        return { tag: "Cycle", cycle: trajectory.slice(entry), entry };
      }
    }

    const size = Math.min(window, trajectory.length);
    return { tag: "Approximate", window: trajectory.slice(trajectory.length - size), steps: maxSteps };
  }

  private sample(word: Word, width: number | undefined): Application[] {
    const apps = this.allApplications(word);
    if (width !== undefined && apps.length > width) return apps.slice(0, width);
    return apps;
  }
}

function tracePath(parent: Map<string, Word | undefined>, end: Word): Word[] {
  const path: Word[] = [];
  let cur: Word | undefined = end;
  while (cur) {
    path.push(cur);
    cur = parent.get(cur.key);
  }
  return path.reverse();
}

/** All words of a boundedReach result, level by level. */
export function reachedWords(levels: ReachLevels): Word[] {
  const keys = [...levels.keys()].sort((a, b) => a - b);
  return keys.flatMap(k => levels.get(k) ?? []);
}
