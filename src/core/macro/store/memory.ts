import type { Outcome } from "../../../outcome/outcome";
import { ok } from "../../../outcome/constructors";
import { MacroDictionary, type DictionaryData, type MacroDictionaryOptions } from "../dictionary";
import type { MacroDictionaryStore } from "./interface";

/**
 * Keeps the last saved snapshot in memory. Loading replays it into a fresh
 * dictionary, so callers never share the saved instance.
 */
export class InMemoryMacroDictionaryStore implements MacroDictionaryStore {
  readonly location = "memory";
  private snapshot: DictionaryData | undefined;

  constructor(private readonly opts: MacroDictionaryOptions = {}) {}

  async save(dictionary: MacroDictionary): Promise<Outcome<string>> {
    this.snapshot = dictionary.toJSON();
    return ok(this.location);
  }

  async load(): Promise<Outcome<MacroDictionary | undefined>> {
    if (!this.snapshot) return ok(undefined);
    return MacroDictionary.fromJSON(this.snapshot, this.opts);
  }
}
