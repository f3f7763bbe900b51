// src/core/words/context.ts
// Windows around an application site, used by overlap and critical-pair analysis.

import type { Rule } from "./rule";
import type { Word } from "./word";

export type Context = {
  word: Word;
  position: number;
  rule?: Rule;
  leftContext?: Word;
  rightContext?: Word;
};

/**
 * Context at `position`, with up to `radius` symbols on each side of the match.
 */
export function contextAt(word: Word, position: number, rule?: Rule, radius = 2): Context {
  const matchEnd = position + (rule ? rule.left.length : 0);
  return {
    word,
    position,
    rule,
    leftContext: word.slice(Math.max(0, position - radius), position),
    rightContext: word.slice(Math.min(word.length, matchEnd), Math.min(word.length, matchEnd + radius)),
  };
}

/**
 * The slice matched by the context's rule, or undefined when there is no rule
 * or the match would run past the end of the word.
 */
export function extractMatch(ctx: Context): Word | undefined {
  if (!ctx.rule) return undefined;
  const len = ctx.rule.left.length;
  if (ctx.position + len > ctx.word.length) return undefined;
  return ctx.word.slice(ctx.position, ctx.position + len);
}

export function describeContext(ctx: Context): string {
  return `Context[${ctx.position}](${ctx.word.content})`;
}
