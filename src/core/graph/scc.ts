// src/core/graph/scc.ts
// Tarjan's strongly connected components, iterative.

import type { Word } from "../words/word";
import { makeId, type TraceSink } from "../../ports/types";
import { nullTraceSink } from "../../adapters/logging";
import type { Graph, VertexId } from "./graph";

/**
 * One strongly connected component. `isAttractor` holds when no member has an
 * edge leaving the component; a singleton with no successors is one too.
 */
export class Component {
  private readonly memberSet: ReadonlySet<VertexId>;

  constructor(
    readonly index: number,
    readonly vertexIds: readonly VertexId[],
    readonly words: readonly Word[],
    readonly isAttractor: boolean
  ) {
    this.memberSet = new Set(vertexIds);
  }

  get size(): number {
    return this.vertexIds.length;
  }

  /** Smallest vertex id; a run-independent name for the component. */
  get anchor(): VertexId {
    return Math.min(...this.vertexIds);
  }

  containsId(id: VertexId): boolean {
    return this.memberSet.has(id);
  }

  contains(w: Word): boolean {
    return this.words.some(m => m.equals(w));
  }

  toString(): string {
    const shown = this.words.slice(0, 3).map(w => w.content).join(", ");
    const more = this.words.length > 3 ? `, ... (+${this.words.length - 3})` : "";
    return `SCC(${shown}${more})${this.isAttractor ? " [ATTRACTOR]" : ""}`;
  }
}

type Frame = { v: VertexId; next: number };

/**
 * Partition of a graph's vertices into SCCs.
 *
 * Uses an explicit work stack of (vertex, next-successor) frames instead of
 * recursion. Roots are tried in vertex-id order and components come out in
 * Tarjan's emission order (reverse topological order of the condensation).
 */
export class TarjanScc {
  private readonly trace: TraceSink;

  constructor(private readonly graph: Graph, opts: { trace?: TraceSink } = {}) {
    this.trace = opts.trace ?? nullTraceSink;
  }

  findSccs(): Component[] {
    const started = Date.now();
    const n = this.graph.vertexCount;
    const index = new Array<number>(n).fill(-1);
    const lowlink = new Array<number>(n).fill(0);
    const onStack = new Array<boolean>(n).fill(false);
    const stack: VertexId[] = [];
    const groups: VertexId[][] = [];
    let counter = 0;

    const visit = (v: VertexId): void => {
      index[v] = counter;
      lowlink[v] = counter;
      counter++;
      stack.push(v);
      onStack[v] = true;
    };

    for (let root = 0; root < n; root++) {
      if (index[root] !== -1) continue;

      visit(root);
      const frames: Frame[] = [{ v: root, next: 0 }];

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (!frame) break;
        const succ = this.graph.successors(frame.v);

        if (frame.next < succ.length) {
          const w = succ[frame.next++] ?? -1;
          if (index[w] === -1) {
            visit(w);
            frames.push({ v: w, next: 0 });
          } else if (onStack[w]) {
            lowlink[frame.v] = Math.min(at(lowlink, frame.v), at(index, w));
          }
          continue;
        }

        frames.pop();
        const v = frame.v;
        if (lowlink[v] === index[v]) {
          const group: VertexId[] = [];
          for (;;) {
            const w = stack.pop();
            if (w === undefined) break;
            onStack[w] = false;
            group.push(w);
            if (w === v) break;
          }
          groups.push(group);
        }

        const parent = frames[frames.length - 1];
        if (parent) {
          lowlink[parent.v] = Math.min(at(lowlink, parent.v), at(lowlink, v));
        }
      }
    }

    const components = this.identifyAttractors(groups);
    this.trace.emit({
      tag: "E_SccComputed",
      id: makeId("scc"),
      components: components.length,
      attractors: components.filter(c => c.isAttractor).length,
      durationMs: Date.now() - started,
    });
    return components;
  }

  /** One pass over every member's edges: O(E). */
  private identifyAttractors(groups: VertexId[][]): Component[] {
    return groups.map((group, i) => {
      const members = new Set(group);
      const closed = group.every(v => this.graph.successors(v).every(w => members.has(w)));
      return new Component(i, group, group.map(v => this.graph.word(v)), closed);
    });
  }
}

function at(xs: readonly number[], i: number): number {
  return xs[i] ?? 0;
}

export function findSccs(graph: Graph, opts: { trace?: TraceSink } = {}): Component[] {
  return new TarjanScc(graph, opts).findSccs();
}
