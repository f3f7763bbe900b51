// src/core/words/ruleSet.ts

import type { Rule } from "./rule";
import type { Word } from "./word";

export type RuleMatch = { rule: Rule; position: number };

/**
 * Ordered rule collection indexed by left-hand side and id.
 */
export class RuleSet implements Iterable<Rule> {
  private rules: Rule[] = [];
  private byLeftSide: Map<string, Rule[]> = new Map();
  private byRuleId: Map<string, Rule> = new Map();

  constructor(rules: Iterable<Rule> = []) {
    for (const r of rules) this.add(r);
  }

  get size(): number {
    return this.rules.length;
  }

  add(rule: Rule): void {
    this.rules.push(rule);
    const bucket = this.byLeftSide.get(rule.left.key) ?? [];
    bucket.push(rule);
    this.byLeftSide.set(rule.left.key, bucket);
    this.byRuleId.set(rule.id, rule);
  }

  /** Remove the first rule equal to `rule`. Returns false if absent. */
  remove(rule: Rule): boolean {
    const idx = this.rules.findIndex(r => r.equals(rule));
    if (idx < 0) return false;
    const [removed] = this.rules.splice(idx, 1);
    if (!removed) return false;

    const bucket = this.byLeftSide.get(removed.left.key) ?? [];
    const inBucket = bucket.indexOf(removed);
    if (inBucket >= 0) bucket.splice(inBucket, 1);
    if (bucket.length === 0) this.byLeftSide.delete(removed.left.key);
    if (this.byRuleId.get(removed.id) === removed) this.byRuleId.delete(removed.id);
    return true;
  }

  has(rule: Rule): boolean {
    return this.rules.some(r => r.equals(rule));
  }

  byLeft(left: Word): Rule[] {
    return [...(this.byLeftSide.get(left.key) ?? [])];
  }

  byId(id: string): Rule | undefined {
    return this.byRuleId.get(id);
  }

  /**
   * Every (rule, position) whose left side occurs in `word`,
   * overlapping occurrences included. Rule order, then position order.
   */
  findApplicable(word: Word): RuleMatch[] {
    const found: RuleMatch[] = [];
    for (const rule of this.rules) {
      if (rule.left.isEmpty()) continue;
      let pos = word.indexOf(rule.left);
      while (pos >= 0) {
        found.push({ rule, position: pos });
        pos = word.indexOf(rule.left, pos + 1);
      }
    }
    return found;
  }

  toArray(): Rule[] {
    return [...this.rules];
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.rules[Symbol.iterator]();
  }
}
