// src/core/macro/index.ts
// Macro lifting: mining, verification, dictionary, persistence

export * from "./types";
export { Macro, type MacroMetadata, createMacro } from "./macro";
export { FrequencyAnalyzer } from "./frequency";
export { LocalConfluenceChecker, type ConfluenceOptions } from "./confluence";
export { BoundedBisimulation, type BisimulationOptions } from "./bisimulation";
export {
  MacroDictionary,
  type MacroDictionaryOptions,
  type DictionaryData,
  type MacroRecord,
  dictionaryDataSchema,
} from "./dictionary";
export {
  MacroLifter,
  type MacroVerifier,
  type MacroLifterOptions,
  type CandidateOutcome,
  type LiftReport,
  boundedVerifier,
} from "./lifter";
export * from "./store";
