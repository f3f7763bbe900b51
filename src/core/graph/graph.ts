// src/core/graph/graph.ts
// Configuration graph as a vertex arena: stable integer ids, index adjacency.

import { Word } from "../words/word";

export type VertexId = number;

export type GraphData = {
  vertices: string[];
  edges: Array<[VertexId, VertexId]>;
};

/**
 * Directed simple graph over words. Parallel edges collapse to one and
 * successor lists keep first-insertion order. Built once, then read.
 */
export class Graph {
  private words: Word[] = [];
  private ids: Map<string, VertexId> = new Map();
  private adjacency: VertexId[][] = [];
  private reverse: VertexId[][] | undefined;
  private edges = 0;

  get vertexCount(): number {
    return this.words.length;
  }

  get edgeCount(): number {
    return this.edges;
  }

  addVertex(w: Word): VertexId {
    const existing = this.ids.get(w.key);
    if (existing !== undefined) return existing;
    const id = this.words.length;
    this.words.push(w);
    this.ids.set(w.key, id);
    this.adjacency.push([]);
    this.reverse = undefined;
    return id;
  }

  /** Adds both endpoints if needed. Returns false when the edge was already present. */
  addEdge(from: Word, to: Word): boolean {
    const u = this.addVertex(from);
    const v = this.addVertex(to);
    return this.addEdgeById(u, v);
  }

  addEdgeById(u: VertexId, v: VertexId): boolean {
    const succ = this.adjacency[u];
    if (!succ || v < 0 || v >= this.words.length) {
      throw new RangeError(`Unknown vertex in edge ${u} -> ${v}`);
    }
    if (succ.includes(v)) return false;
    succ.push(v);
    this.edges++;
    this.reverse = undefined;
    return true;
  }

  has(w: Word): boolean {
    return this.ids.has(w.key);
  }

  idOf(w: Word): VertexId | undefined {
    return this.ids.get(w.key);
  }

  word(id: VertexId): Word {
    const w = this.words[id];
    if (!w) throw new RangeError(`Unknown vertex id ${id}`);
    return w;
  }

  vertices(): readonly Word[] {
    return this.words;
  }

  successors(id: VertexId): readonly VertexId[] {
    return this.adjacency[id] ?? [];
  }

  /** Reverse adjacency, built on first use and cached until the graph changes. */
  predecessors(id: VertexId): readonly VertexId[] {
    if (!this.reverse) this.reverse = this.buildReverse();
    return this.reverse[id] ?? [];
  }

  neighbors(w: Word): Word[] {
    const id = this.ids.get(w.key);
    if (id === undefined) return [];
    return this.successors(id).map(v => this.word(v));
  }

  toJSON(): GraphData {
    const edges: Array<[VertexId, VertexId]> = [];
    this.adjacency.forEach((succ, u) => {
      for (const v of succ) edges.push([u, v]);
    });
    return { vertices: this.words.map(w => w.content), edges };
  }

  static fromJSON(data: GraphData): Graph {
    const g = new Graph();
    for (const v of data.vertices) g.addVertex(Word.of(v));
    for (const [u, v] of data.edges) g.addEdgeById(u, v);
    return g;
  }

  private buildReverse(): VertexId[][] {
    const rev: VertexId[][] = this.words.map(() => []);
    this.adjacency.forEach((succ, u) => {
      for (const v of succ) rev[v]?.push(u);
    });
    return rev;
  }
}
