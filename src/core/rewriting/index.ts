// src/core/rewriting/index.ts

export { RewritingEngine, reachedWords } from "./engine";
export {
  type Application,
  type ReachLevels,
  type PathResult,
  type LimitResult,
  limitWords,
  isFound,
} from "./types";
