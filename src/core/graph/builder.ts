// src/core/graph/builder.ts
// Builds the configuration graph G_L from a rule set.

import type { Rule } from "../words/rule";
import { Word } from "../words/word";
import { Alphabet } from "../words/alphabet";
import { RewritingEngine } from "../rewriting/engine";
import { makeId, type TraceSink } from "../../ports/types";
import { nullTraceSink } from "../../adapters/logging";
import { Graph } from "./graph";

export type GraphBuilderOptions = {
  alphabet?: Alphabet;
  trace?: TraceSink;
};

export class GraphBuilder {
  readonly engine: RewritingEngine;
  readonly alphabet: Alphabet;
  private readonly trace: TraceSink;

  constructor(rules: Iterable<Rule> | RewritingEngine, opts: GraphBuilderOptions = {}) {
    this.engine = rules instanceof RewritingEngine ? rules : new RewritingEngine(rules);
    this.alphabet = opts.alphabet ?? Alphabet.base();
    this.trace = opts.trace ?? nullTraceSink;
  }

  /**
   * Every word of length 0..maxLength, shortest first, each length in
   * alphabet order. There are sum |A|^k of them: keep maxLength small.
   */
  generateStrings(maxLength: number): Word[] {
    const symbols = this.alphabet.symbols().map(s => s.value);
    const out: Word[] = [Word.EMPTY];
    let frontier: string[] = [""];

    for (let len = 1; len <= maxLength; len++) {
      const next: string[] = [];
      for (const prefix of frontier) {
        for (const s of symbols) next.push(prefix + s);
      }
      for (const s of next) out.push(Word.of(s));
      frontier = next;
    }

    return out;
  }

  /**
   * G_L: all words up to `maxLength` as vertices; an edge for each one-step
   * rewrite whose result also fits. Longer results are left out of the graph
   * (the relation itself still has them).
   */
  buildGraph(maxLength: number): Graph {
    const start = Date.now();
    const vertices = this.generateStrings(maxLength);
    const graph = new Graph();
    for (const v of vertices) graph.addVertex(v);

    // Successor lists are independent per vertex; merged afterwards.
    const successorLists = vertices.map(v =>
      this.engine.allApplications(v).map(a => a.result).filter(w => w.length <= maxLength)
    );
    vertices.forEach((v, i) => {
      for (const w of successorLists[i] ?? []) graph.addEdge(v, w);
    });

    this.trace.emit({
      tag: "E_GraphBuilt",
      id: makeId("graph"),
      mode: "full",
      vertices: graph.vertexCount,
      edges: graph.edgeCount,
      durationMs: Date.now() - start,
    });
    return graph;
  }

  /**
   * BFS from `seeds` without enumerating the whole space. Every vertex and
   * edge met on the way is kept, including edges into words first seen at the
   * `depth` frontier (those words are added but not expanded).
   */
  buildIncremental(seeds: Iterable<Word>, depth: number): Graph {
    const start = Date.now();
    const graph = new Graph();
    const queue: Array<{ word: Word; level: number }> = [];
    for (const s of seeds) {
      if (graph.has(s)) continue;
      graph.addVertex(s);
      queue.push({ word: s, level: 0 });
    }

    let head = 0;
    while (head < queue.length) {
      const item = queue[head++];
      if (!item || item.level >= depth) continue;

      for (const app of this.engine.allApplications(item.word)) {
        const isNew = !graph.has(app.result);
        graph.addEdge(item.word, app.result);
        if (isNew) queue.push({ word: app.result, level: item.level + 1 });
      }
    }

    this.trace.emit({
      tag: "E_GraphBuilt",
      id: makeId("graph"),
      mode: "incremental",
      vertices: graph.vertexCount,
      edges: graph.edgeCount,
      durationMs: Date.now() - start,
    });
    return graph;
  }
}
