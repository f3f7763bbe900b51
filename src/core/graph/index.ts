// src/core/graph/index.ts

export { Graph, type GraphData, type VertexId } from "./graph";
export { GraphBuilder, type GraphBuilderOptions } from "./builder";
export { Component, TarjanScc, findSccs } from "./scc";
export { AttractorAnalyzer } from "./attractors";
