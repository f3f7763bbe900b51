// src/core/macro/macro.ts
// A macro: a fresh symbol standing for a recurring definition.

import { Rule } from "../words/rule";
import { Word } from "../words/word";
import type { Sym } from "../words/symbol";
import type { Outcome } from "../../outcome/outcome";
import { diagnosed, ok } from "../../outcome/constructors";

export type MacroMetadata = Readonly<Record<string, unknown>>;

/**
 * Immutable. Created unverified; `markVerified` returns a verified copy,
 * which is the only kind a dictionary will admit.
 */
export class Macro {
  /** symbol → definition */
  readonly introduction: Rule;
  /** definition → symbol */
  readonly elimination: Rule;

  constructor(
    readonly symbol: Sym,
    readonly definition: Word,
    readonly verified: boolean = false,
    readonly metadata: MacroMetadata = {}
  ) {
    const symWord = Word.of(symbol.value);
    this.introduction = new Rule(symWord, definition, { macro: symbol.value, role: "introduction" });
    this.elimination = new Rule(definition, symWord, { macro: symbol.value, role: "elimination" });
  }

  /** The two rules a macro adds to a system. */
  get rules(): readonly Rule[] {
    return [this.introduction, this.elimination];
  }

  /** True when the definition mentions the macro's own symbol. */
  isSelfReferential(): boolean {
    return this.definition.content.includes(this.symbol.value);
  }

  markVerified(extra: MacroMetadata = {}): Macro {
    return new Macro(this.symbol, this.definition, true, { ...this.metadata, ...extra });
  }

  describe(): string {
    return `${this.symbol.value} := ${this.definition.content} ${this.verified ? "✓" : "?"}`;
  }

  toString(): string {
    return this.describe();
  }
}

/**
 * Build an unverified macro, refusing definitions that could never expand
 * away: empty ones and ones that contain the symbol itself.
 */
export function createMacro(symbol: Sym, definition: Word, metadata: MacroMetadata = {}): Outcome<Macro> {
  if (definition.isEmpty()) {
    return diagnosed("validation-failed", "E0206", {}, { context: { symbol: symbol.value } });
  }
  const macro = new Macro(symbol, definition, false, metadata);
  if (macro.isSelfReferential()) {
    return diagnosed("self-referential-macro", "E0204", { symbol: symbol.value }, {
      context: { definition: definition.content },
    });
  }
  return ok(macro);
}
