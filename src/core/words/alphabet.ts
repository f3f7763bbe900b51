// src/core/words/alphabet.ts

import { Sym, BASE_SYMBOLS } from "./symbol";

/** Symbols handed out to macros, in order. */
export const MACRO_SYMBOL_POOL = "ABCDEFGHIJKLMNOPQRSTUVWXYZαβγδεζηθικλμνξπρστυφχψω";

/**
 * Ordered, extensible symbol set. Iteration follows insertion order,
 * which fixes the enumeration order of generated words.
 */
export class Alphabet implements Iterable<Sym> {
  private readonly order: Sym[] = [];

  constructor(symbols: Iterable<Sym | string> = []) {
    for (const s of symbols) this.add(s);
  }

  static base(): Alphabet {
    return new Alphabet(BASE_SYMBOLS);
  }

  get size(): number {
    return this.order.length;
  }

  has(sym: Sym | string): boolean {
    const value = typeof sym === "string" ? sym : sym.value;
    return this.order.some(s => s.value === value);
  }

  add(sym: Sym | string): Sym {
    const s = typeof sym === "string" ? Sym.of(sym) : sym;
    if (!this.order.includes(s)) this.order.push(s);
    return s;
  }

  symbols(): readonly Sym[] {
    return this.order;
  }

  /**
   * First pool symbol that is neither in the alphabet nor excluded.
   * Undefined once the pool is used up.
   */
  freshSymbol(exclude: Iterable<Sym> = []): Sym | undefined {
    const taken = new Set<Sym>(exclude);
    for (const ch of MACRO_SYMBOL_POOL) {
      const candidate = Sym.of(ch);
      if (!taken.has(candidate) && !this.order.includes(candidate)) return candidate;
    }
    return undefined;
  }

  clone(): Alphabet {
    return new Alphabet(this.order);
  }

  [Symbol.iterator](): Iterator<Sym> {
    return this.order[Symbol.iterator]();
  }

  toString(): string {
    return `{${this.order.map(s => s.value).join(", ")}}`;
  }
}
