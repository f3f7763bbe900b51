// src/core/macro/types.ts
// Shared types for the macro lifting pipeline.

import type { Word } from "../words/word";

/**
 * A substring mined from an attractor, with the statistics used to rank it.
 * Ephemeral: never persisted.
 */
export type PatternCandidate = {
  pattern: Word;
  /** Occurrences across all members, overlapping ones included */
  frequency: number;
  /** Fraction of members that contain the pattern */
  stability: number;
  /** frequency × stability × (1 + 0.1·|pattern|) */
  score: number;
};

/** Anything with a member list: a Component, or a hand-built set of words. */
export type SccLike = {
  readonly words: readonly Word[];
};

/**
 * Lifecycle of one candidate. Moves forward only:
 * proposed → confluence-checked → bisimulation-checked → admitted,
 * or to rejected from any earlier state.
 */
export type MacroStatus =
  | "proposed"
  | "confluence-checked"
  | "bisimulation-checked"
  | "admitted"
  | "rejected";

export type ConfluenceResult =
  | { tag: "Confluent"; tested: number }
  | { tag: "Divergent"; source: Word; left: Word; right: Word };

export type BisimulationResult =
  | { tag: "Equivalent"; tested: number }
  | { tag: "Diverged"; word: Word; oldFinal: Word[]; newFinal: Word[]; difference: number };

/** Result of expanding macro symbols back to base symbols. */
export type Expansion = {
  word: Word;
  /** False when the iteration cap stopped expansion with symbols left */
  complete: boolean;
  iterations: number;
};

export type HistoryEntry = {
  version: number;
  action: "add";
  /** Human-readable description, e.g. "A := 0| ✓" */
  macro: string;
  symbol: string;
};

export function describeCandidate(c: PatternCandidate): string {
  return `'${c.pattern.content}' (freq=${c.frequency}, stab=${c.stability.toFixed(2)}, score=${c.score.toFixed(2)})`;
}
