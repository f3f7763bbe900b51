// src/core/overlap/index.ts

export { AhoCorasick, type PatternMatch } from "./ahoCorasick";
export { OverlapDetector, type Overlap, describeOverlap } from "./detector";
