// src/core/words/index.ts

export { Sym, UNIT, SEPARATOR, BASE_SYMBOLS, isBaseSymbol } from "./symbol";
export { Word, word, words } from "./word";
export { Alphabet, MACRO_SYMBOL_POOL } from "./alphabet";
export { Rule, type RuleMetadata, parseRule, parseRules, leftSides } from "./rule";
export { RuleSet, type RuleMatch } from "./ruleSet";
export { type Context, contextAt, extractMatch, describeContext } from "./context";
