// src/core/graph/attractors.ts
// Attractors and their basins.

import type { Word } from "../words/word";
import type { Graph, VertexId } from "./graph";
import type { Component } from "./scc";

/**
 * Basins of attraction over a built graph.
 *
 * Attractors are kept in anchor order (smallest member vertex id). Vertex ids
 * follow graph construction order, so this order, and with it the tie-break of
 * classifyVertices, is the same on every run.
 */
export class AttractorAnalyzer {
  readonly attractors: readonly Component[];
  private readonly basins = new Map<number, ReadonlySet<VertexId>>();

  constructor(private readonly graph: Graph, components: readonly Component[]) {
    this.attractors = components.filter(c => c.isAttractor).sort((a, b) => a.anchor - b.anchor);
  }

  /**
   * Vertex ids from which the attractor is reachable: its own members plus
   * everything found by BFS over reversed edges. Cached per attractor.
   */
  basinIds(attractor: Component): ReadonlySet<VertexId> {
    const cached = this.basins.get(attractor.index);
    if (cached) return cached;

    const basin = new Set<VertexId>(attractor.vertexIds);
    const queue: VertexId[] = [...attractor.vertexIds];
    let head = 0;
    while (head < queue.length) {
      const cur = queue[head++];
      if (cur === undefined) continue;
      for (const pred of this.graph.predecessors(cur)) {
        if (basin.has(pred)) continue;
        basin.add(pred);
        queue.push(pred);
      }
    }

    this.basins.set(attractor.index, basin);
    return basin;
  }

  /** Basin as words, attractor members first, then in discovery order. */
  findBasin(attractor: Component): Word[] {
    return [...this.basinIds(attractor)].map(id => this.graph.word(id));
  }

  /**
   * Maps each vertex (by word content) to the first attractor, in anchor
   * order, whose basin holds it; null when no attractor is reachable.
   */
  classifyVertices(): Map<string, Component | null> {
    const out = new Map<string, Component | null>();
    const words = this.graph.vertices();
    words.forEach((w, id) => {
      const owner = this.attractors.find(a => this.basinIds(a).has(id));
      out.set(w.key, owner ?? null);
    });
    return out;
  }

  /** Every attractor whose basin holds each vertex. */
  basinMemberships(): Map<string, Component[]> {
    const out = new Map<string, Component[]>();
    const words = this.graph.vertices();
    words.forEach((w, id) => {
      out.set(w.key, this.attractors.filter(a => this.basinIds(a).has(id)));
    });
    return out;
  }

  attractorOf(w: Word): Component | undefined {
    return this.attractors.find(a => a.contains(w));
  }
}
