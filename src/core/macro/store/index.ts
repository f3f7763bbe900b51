export type { MacroDictionaryStore } from "./interface";
export { FileMacroDictionaryStore } from "./file";
export { InMemoryMacroDictionaryStore } from "./memory";
