import type { Outcome } from "../../../outcome/outcome";
import type { MacroDictionary } from "../dictionary";

/**
 * Where a dictionary lives between runs. Failures come back as `Fail`
 * outcomes (io-error, schema-mismatch), never as rejected promises.
 */
export interface MacroDictionaryStore {
  /** Human-readable location, used in log events */
  readonly location: string;

  /** Persist the whole dictionary; resolves to the location written. */
  save(dictionary: MacroDictionary): Promise<Outcome<string>>;

  /** Undefined when nothing has been saved yet. */
  load(): Promise<Outcome<MacroDictionary | undefined>>;
}
