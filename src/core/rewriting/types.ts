// src/core/rewriting/types.ts

import type { Rule } from "../words/rule";
import type { Word } from "../words/word";

/** One step of the relation: `rule` applied at `position` yields `result`. */
export type Application = {
  result: Word;
  rule: Rule;
  position: number;
};

/**
 * Newly reached words per BFS level. Level 0 holds the start word.
 * Levels that reached nothing new are absent; words appear once overall,
 * in discovery order.
 */
export type ReachLevels = Map<number, Word[]>;

export type PathResult =
  | { tag: "Found"; path: Word[] }
  | { tag: "NotFound"; explored: number };

/**
 * Outcome of following the first application from a start word.
 * `Approximate` means no revisit happened within the step budget and
 * `window` is only the tail of the trajectory.
 */
export type LimitResult =
  | { tag: "Terminal"; word: Word; steps: number }
  | { tag: "Cycle"; cycle: Word[]; entry: number }
  | { tag: "Approximate"; window: Word[]; steps: number };

export function limitWords(result: LimitResult): Word[] {
  switch (result.tag) {
    case "Terminal":
      return [result.word];
    case "Cycle":
      return result.cycle;
    case "Approximate":
      return result.window;
  }
}

export function isFound(result: PathResult): result is { tag: "Found"; path: Word[] } {
  return result.tag === "Found";
}
