// src/core/words/word.ts
// Immutable finite words over an alphabet of one-character symbols.

import { Sym, UNIT, SEPARATOR } from "./symbol";
import type { Alphabet } from "./alphabet";

/**
 * A finite word. Backed by a JS string with one character per symbol,
 * so `key` doubles as the structural hash for maps and sets.
 */
export class Word {
  static readonly EMPTY = new Word("");

  private blocksCache: readonly number[] | undefined;

  private constructor(readonly content: string) {}

  static of(content: string): Word {
    return content.length === 0 ? Word.EMPTY : new Word(content);
  }

  static fromSymbols(symbols: readonly Sym[]): Word {
    return Word.of(symbols.map(s => s.value).join(""));
  }

  /**
   * Build 0^b1|0^b2|...|0^bn.
   */
  static fromBlocks(blocks: readonly number[], separator: Sym = SEPARATOR): Word {
    return Word.of(blocks.map(b => UNIT.value.repeat(b)).join(separator.value));
  }

  get length(): number {
    return this.content.length;
  }

  get key(): string {
    return this.content;
  }

  isEmpty(): boolean {
    return this.content.length === 0;
  }

  at(index: number): Sym | undefined {
    const ch = this.content[index];
    return ch === undefined ? undefined : Sym.of(ch);
  }

  symbols(): Sym[] {
    return Array.from(this.content, ch => Sym.of(ch));
  }

  slice(start: number, end?: number): Word {
    return Word.of(this.content.slice(start, end));
  }

  concat(other: Word): Word {
    return Word.of(this.content + other.content);
  }

  equals(other: Word): boolean {
    return this.content === other.content;
  }

  includes(pattern: Word): boolean {
    return this.content.includes(pattern.content);
  }

  indexOf(pattern: Word, from = 0): number {
    return this.content.indexOf(pattern.content, from);
  }

  startsWith(pattern: Word, at = 0): boolean {
    return this.content.startsWith(pattern.content, at);
  }

  count(sym: Sym): number {
    let n = 0;
    for (const ch of this.content) {
      if (ch === sym.value) n++;
    }
    return n;
  }

  /**
   * Lengths of the maximal runs of `0` between separators: `00|000|0` is [2, 3, 1].
   * An empty run between two separators counts as 0; a trailing separator
   * does not open a new block. Symbols other than `0` and `|` are skipped.
   */
  blocks(): readonly number[] {
    if (this.blocksCache) return this.blocksCache;

    const blocks: number[] = [];
    let run = 0;
    for (const ch of this.content) {
      if (ch === UNIT.value) {
        run++;
      } else if (ch === SEPARATOR.value) {
        blocks.push(run);
        run = 0;
      }
    }
    if (run > 0 || (this.content.length > 0 && !this.content.endsWith(SEPARATOR.value))) {
      blocks.push(run);
    }

    this.blocksCache = blocks;
    return blocks;
  }

  /** True when every symbol belongs to the alphabet. */
  validate(alphabet: Alphabet): boolean {
    for (const ch of this.content) {
      if (!alphabet.has(ch)) return false;
    }
    return true;
  }

  toString(): string {
    return this.content;
  }

  toJSON(): string {
    return this.content;
  }
}

export function word(content: string): Word {
  return Word.of(content);
}

export function words(...contents: string[]): Word[] {
  return contents.map(Word.of);
}
