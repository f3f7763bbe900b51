// src/core/words/symbol.ts
// Alphabet elements: interned, so reference equality is value equality.

export class Sym {
  private static readonly interned = new Map<string, Sym>();

  private constructor(readonly value: string) {}

  /**
   * Get the symbol for a one-character value.
   * Throws on anything else: symbols index words character by character.
   */
  static of(value: string): Sym {
    const existing = Sym.interned.get(value);
    if (existing) return existing;
    if (value.length !== 1) {
      throw new Error(`Symbol must be a single character: ${JSON.stringify(value)}`);
    }
    const sym = new Sym(value);
    Sym.interned.set(value, sym);
    return sym;
  }

  equals(other: Sym): boolean {
    return this === other;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** The unit stroke. */
export const UNIT = Sym.of("0");

/** Block separator. */
export const SEPARATOR = Sym.of("|");

export const BASE_SYMBOLS: readonly Sym[] = [UNIT, SEPARATOR];

export function isBaseSymbol(sym: Sym): boolean {
  return sym === UNIT || sym === SEPARATOR;
}
