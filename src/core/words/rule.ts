// src/core/words/rule.ts
// Rewrite rules L → R.

import { Word } from "./word";

export type RuleMetadata = Readonly<Record<string, unknown>>;

/**
 * Ordered pair (left, right). Two rules are equal iff both sides match;
 * the id and metadata do not take part in equality.
 */
export class Rule {
  readonly id: string;

  constructor(
    readonly left: Word,
    readonly right: Word,
    readonly metadata: RuleMetadata = {},
    id?: string
  ) {
    this.id = id ?? `${left.content}→${right.content}`;
  }

  static of(left: string, right: string, metadata: RuleMetadata = {}): Rule {
    return new Rule(Word.of(left), Word.of(right), metadata);
  }

  /** Length change caused by one application. */
  get delta(): number {
    return this.right.length - this.left.length;
  }

  equals(other: Rule): boolean {
    return this.left.equals(other.left) && this.right.equals(other.right);
  }

  /** Declared reversible through the `reversible` metadata flag. */
  isReversible(): boolean {
    return this.metadata.reversible === true;
  }

  inverse(): Rule {
    return new Rule(this.right, this.left, { ...this.metadata, inverseOf: this.id }, `inv_${this.id}`);
  }

  withMetadata(extra: RuleMetadata): Rule {
    return new Rule(this.left, this.right, { ...this.metadata, ...extra }, this.id);
  }

  toString(): string {
    return `${this.left.content} → ${this.right.content}`;
  }

  toJSON(): { left: string; right: string } {
    return { left: this.left.content, right: this.right.content };
  }
}

const ARROW = /\s*(?:->|→)\s*/;

/**
 * Parse `"00 -> 0|"` (or `"00 → 0|"`). The left side must be non-empty;
 * an empty right side deletes the match.
 */
export function parseRule(text: string, metadata: RuleMetadata = {}): Rule {
  const parts = text.trim().split(ARROW);
  if (parts.length !== 2) {
    throw new Error(`Malformed rule: ${JSON.stringify(text)}`);
  }
  const [left, right] = parts;
  if (left === undefined || right === undefined || left.length === 0) {
    throw new Error(`Malformed rule: ${JSON.stringify(text)}`);
  }
  return Rule.of(left, right, metadata);
}

/**
 * Parse one rule per line (or per `;`). Blank lines and `#` comments are skipped.
 */
export function parseRules(source: string | readonly string[]): Rule[] {
  const lines = typeof source === "string" ? source.split(/[\n;]/) : source;
  const rules: Rule[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    rules.push(parseRule(line));
  }
  return rules;
}

export function leftSides(rules: readonly Rule[]): Word[] {
  return rules.map(r => r.left);
}
