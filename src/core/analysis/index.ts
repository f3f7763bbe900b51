export {
  analyzeSystem,
  AnalysisReport,
  type AnalysisOptions,
  type AttractorSummary,
  type GraphStats,
} from "./analyzer";
