// src/core/macro/dictionary.ts
// Versioned, append-only dictionary of verified macros.

import { z } from "zod";
import { Word } from "../words/word";
import { Sym, isBaseSymbol } from "../words/symbol";
import { Alphabet } from "../words/alphabet";
import type { Outcome } from "../../outcome/outcome";
import { isFail } from "../../outcome/outcome";
import { budgetExceeded, diagnosed, ok, schemaMismatch } from "../../outcome/constructors";
import { makeId, type TraceSink } from "../../ports/types";
import { nullTraceSink } from "../../adapters/logging";
import { Macro } from "./macro";
import type { Expansion, HistoryEntry } from "./types";

const DEFAULT_EXPANSION_CAP = 100;

const macroRecordSchema = z.object({
  symbol: z.string().length(1),
  definition: z.string().min(1),
  verified: z.boolean(),
  metadata: z.record(z.unknown()).default({}),
});

const historyEntrySchema = z.object({
  version: z.number().int().positive(),
  action: z.literal("add"),
  macro: z.string(),
  symbol: z.string(),
});

export const dictionaryDataSchema = z.object({
  version: z.number().int().positive(),
  macros: z.array(macroRecordSchema),
  history: z.array(historyEntrySchema),
});

/** Persisted layout. */
export type DictionaryData = z.infer<typeof dictionaryDataSchema>;
export type MacroRecord = z.infer<typeof macroRecordSchema>;

export type MacroDictionaryOptions = {
  /** Substitution passes before expand gives up */
  expansionCap?: number;
  trace?: TraceSink;
};

/**
 * Starts empty at version 1. `admit` is the only mutation: each admitted
 * macro bumps the version by one and appends a history entry. Macros and
 * history are never removed or reordered.
 */
export class MacroDictionary {
  private readonly entries: Macro[] = [];
  private readonly log: HistoryEntry[] = [];
  private current = 1;
  readonly expansionCap: number;
  private readonly trace: TraceSink;

  constructor(opts: MacroDictionaryOptions = {}) {
    this.expansionCap = opts.expansionCap ?? DEFAULT_EXPANSION_CAP;
    this.trace = opts.trace ?? nullTraceSink;
  }

  get version(): number {
    return this.current;
  }

  get macros(): readonly Macro[] {
    return this.entries;
  }

  get history(): readonly HistoryEntry[] {
    return this.log;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Compare-and-append. With `expectedVersion`, refuses unless the dictionary
   * is still at that version, so two writers cannot both claim the same slot.
   * Returns the new version.
   */
  admit(macro: Macro, expectedVersion?: number): Outcome<number> {
    const symbol = macro.symbol.value;

    if (expectedVersion !== undefined && expectedVersion !== this.current) {
      return diagnosed("version-conflict", "E0205", { actual: this.current, expected: expectedVersion });
    }
    if (!macro.verified) {
      return diagnosed("not-verified", "E0201", { symbol });
    }
    if (macro.definition.isEmpty()) {
      return diagnosed("validation-failed", "E0206", {}, { context: { symbol } });
    }
    if (macro.isSelfReferential() || this.entries.some(m => m.definition.content.includes(symbol))) {
      return diagnosed("self-referential-macro", "E0204", { symbol }, {
        context: { definition: macro.definition.content },
      });
    }
    if (isBaseSymbol(macro.symbol) || this.getMacro(macro.symbol)) {
      return diagnosed("duplicate-symbol", "E0202", { symbol });
    }
    if (this.findByDefinition(macro.definition)) {
      return diagnosed("validation-failed", "E0203", { definition: macro.definition.content });
    }

    this.entries.push(macro);
    this.current += 1;
    this.log.push({ version: this.current, action: "add", macro: macro.describe(), symbol });
    return ok(this.current);
  }

  getMacro(symbol: Sym | string): Macro | undefined {
    const value = typeof symbol === "string" ? symbol : symbol.value;
    return this.entries.find(m => m.symbol.value === value);
  }

  findByDefinition(definition: Word): Macro | undefined {
    return this.entries.find(m => m.definition.equals(definition));
  }

  /** Base symbols followed by every macro symbol, in admission order. */
  alphabet(): Alphabet {
    const alphabet = Alphabet.base();
    for (const m of this.entries) alphabet.add(m.symbol);
    return alphabet;
  }

  /**
   * Replace macro symbols by their definitions, one pass per macro in
   * admission order, until a full round changes nothing or the cap is hit.
   * `complete` is false when macro symbols are left over.
   */
  expand(w: Word): Expansion {
    let current = w.content;
    let changed = true;
    let iterations = 0;

    while (changed && iterations < this.expansionCap) {
      changed = false;
      iterations++;
      for (const m of this.entries) {
        if (!current.includes(m.symbol.value)) continue;
        current = current.split(m.symbol.value).join(m.definition.content);
        changed = true;
      }
    }

    const word = Word.of(current);
    const remaining = this.countMacroSymbols(word);
    if (remaining > 0) {
      this.trace.emit({ tag: "E_ExpansionCapped", id: makeId("expand"), iterations, remaining });
    }
    return { word, complete: remaining === 0, iterations };
  }

  /** Like expand, but a capped expansion is a budget failure. */
  expandStrict(w: Word): Outcome<Word> {
    const result = this.expand(w);
    if (!result.complete) {
      return budgetExceeded("expansion", { budgetUsed: { iterations: result.iterations } });
    }
    return ok(result.word, { budgetUsed: { iterations: result.iterations } });
  }

  /**
   * Replace definitions by their symbols in one left-to-right pass per
   * macro, longest definition first.
   */
  contract(w: Word): Word {
    const byLength = [...this.entries].sort((a, b) => b.definition.length - a.definition.length);
    let current = w.content;
    for (const m of byLength) {
      current = current.split(m.definition.content).join(m.symbol.value);
    }
    return Word.of(current);
  }

  /** True when some macro definition occurs in the word. */
  covers(w: Word): boolean {
    return this.entries.some(m => w.includes(m.definition));
  }

  toJSON(): DictionaryData {
    return {
      version: this.current,
      macros: this.entries.map(m => ({
        symbol: m.symbol.value,
        definition: m.definition.content,
        verified: m.verified,
        metadata: { ...m.metadata },
      })),
      history: this.log.map(h => ({ ...h })),
    };
  }

  /**
   * Rebuild a dictionary by replaying every stored macro through `admit`.
   * Anything admit would refuse, or a version that does not match the macro
   * count, is a schema mismatch.
   */
  static fromJSON(data: unknown, opts: MacroDictionaryOptions = {}): Outcome<MacroDictionary> {
    const parsed = dictionaryDataSchema.safeParse(data);
    if (!parsed.success) {
      return schemaMismatch("Invalid macro dictionary", {
        issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
      });
    }

    const dict = new MacroDictionary(opts);
    for (const record of parsed.data.macros) {
      const macro = new Macro(Sym.of(record.symbol), Word.of(record.definition), record.verified, record.metadata);
      const admitted = dict.admit(macro);
      if (isFail(admitted)) {
        return schemaMismatch(`Stored macro ${record.symbol} rejected: ${admitted.failure.message}`, {
          symbol: record.symbol,
          reason: admitted.failure.reason,
        });
      }
    }

    if (dict.version !== parsed.data.version) {
      return schemaMismatch(`Stored version ${parsed.data.version} does not match ${dict.size} macros`, {
        version: parsed.data.version,
      });
    }
    return ok(dict);
  }

  private countMacroSymbols(w: Word): number {
    let n = 0;
    for (const ch of w.content) {
      if (this.getMacro(ch)) n++;
    }
    return n;
  }
}
