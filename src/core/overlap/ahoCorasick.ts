// src/core/overlap/ahoCorasick.ts
// Multi-pattern matching in one pass over the text.

import type { Word } from "../words/word";

export type PatternMatch = {
  /** Index of the last symbol of the match. */
  end: number;
  start: number;
  pattern: string;
};

type Node = {
  children: Map<string, number>;
  fail: number;
  /** Pattern indices ending here, own first, then inherited through `fail`. */
  output: number[];
  depth: number;
};

const ROOT = 0;

/**
 * Aho–Corasick automaton over one-character symbols. Nodes live in an array
 * and refer to each other by index.
 *
 * search() reports every occurrence, overlapping and nested ones included,
 * in O(n + sum |p| + z).
 */
export class AhoCorasick {
  private nodes: Node[] = [newNode(0)];
  private readonly patterns: string[] = [];
  private built = false;

  constructor(patterns: Iterable<string | Word> = []) {
    for (const p of patterns) this.addPattern(p);
  }

  /** Empty patterns are ignored. */
  addPattern(pattern: string | Word): void {
    const text = typeof pattern === "string" ? pattern : pattern.content;
    if (text.length === 0) return;

    const idx = this.patterns.length;
    this.patterns.push(text);

    let cur = ROOT;
    for (const ch of text) {
      const node = this.node(cur);
      let next = node.children.get(ch);
      if (next === undefined) {
        next = this.nodes.length;
        this.nodes.push(newNode(node.depth + 1));
        node.children.set(ch, next);
      }
      cur = next;
    }
    this.node(cur).output.push(idx);
    this.built = false;
  }

  /**
   * Failure links by BFS; each node inherits the output of its failure target.
   */
  build(): void {
    // Adding patterns after a build would leave stale inherited outputs.
    for (const n of this.nodes) {
      n.output = n.output.filter(i => this.endsAt(i, n.depth));
      n.fail = ROOT;
    }

    const queue: number[] = [];
    for (const child of this.node(ROOT).children.values()) {
      this.node(child).fail = ROOT;
      queue.push(child);
    }

    let head = 0;
    while (head < queue.length) {
      const curId = queue[head++];
      if (curId === undefined) continue;
      const cur = this.node(curId);

      for (const [ch, childId] of cur.children) {
        queue.push(childId);
        const child = this.node(childId);

        let f: number | undefined = cur.fail;
        let target: number | undefined;
        for (;;) {
          target = this.node(f).children.get(ch);
          if (target !== undefined || f === ROOT) break;
          f = this.node(f).fail;
        }
        child.fail = target ?? ROOT;

        const inherited = this.node(child.fail).output;
        if (inherited.length > 0) child.output.push(...inherited);
      }
    }

    this.built = true;
  }

  search(text: string | Word): PatternMatch[] {
    if (!this.built) this.build();
    const s = typeof text === "string" ? text : text.content;
    const matches: PatternMatch[] = [];
    let cur = ROOT;

    for (let i = 0; i < s.length; i++) {
      const ch = s.charAt(i);
      while (cur !== ROOT && !this.node(cur).children.has(ch)) {
        cur = this.node(cur).fail;
      }
      cur = this.node(cur).children.get(ch) ?? ROOT;

      for (const idx of this.node(cur).output) {
        const pattern = this.patterns[idx] ?? "";
        matches.push({ end: i, start: i - pattern.length + 1, pattern });
      }
    }

    return matches;
  }

  /** Start positions of every pattern, ascending. Absent patterns map to []. */
  findAllPositions(text: string | Word): Map<string, number[]> {
    const positions = new Map<string, number[]>();
    for (const p of this.patterns) positions.set(p, []);
    for (const m of this.search(text)) {
      positions.get(m.pattern)?.push(m.start);
    }
    for (const list of positions.values()) list.sort((a, b) => a - b);
    return positions;
  }

  get patternCount(): number {
    return this.patterns.length;
  }

  private node(id: number): Node {
    const n = this.nodes[id];
    if (!n) throw new RangeError(`AhoCorasick: no node ${id}`);
    return n;
  }

  /** Own outputs only: pattern `i` has exactly the node's depth. */
  private endsAt(i: number, depth: number): boolean {
    return (this.patterns[i]?.length ?? -1) === depth;
  }
}

function newNode(depth: number): Node {
  return { children: new Map(), fail: ROOT, output: [], depth };
}
