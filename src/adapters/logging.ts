import type { MacroDictionary } from "../core/macro/dictionary";
import type { MacroDictionaryStore } from "../core/macro/store/interface";
import type { Outcome } from "../outcome/outcome";
import { isDone } from "../outcome/outcome";
import { makeId, type TraceEvent, type TraceSink, type TraceTag } from "../ports/types";

/** Discards every event. */
export const nullTraceSink: TraceSink = {
  emit() {},
};

export type MemoryTraceSink = TraceSink & {
  readonly events: TraceEvent[];
  ofTag<T extends TraceTag>(tag: T): Array<Extract<TraceEvent, { tag: T }>>;
  clear(): void;
};

/**
 * Keeps events in memory, in emission order.
 */
export function memoryTraceSink(): MemoryTraceSink {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent) {
      events.push(event);
    },
    ofTag<T extends TraceTag>(tag: T): Array<Extract<TraceEvent, { tag: T }>> {
      const out: Array<Extract<TraceEvent, { tag: T }>> = [];
      for (const e of events) {
        if (isTag(e, tag)) out.push(e);
      }
      return out;
    },
    clear() {
      events.length = 0;
    },
  };
}

function isTag<T extends TraceTag>(e: TraceEvent, tag: T): e is Extract<TraceEvent, { tag: T }> {
  return e.tag === tag;
}

/**
 * Writes one JSON line per event to stderr.
 */
export function consoleTraceSink(write: (line: string) => void = line => console.error(line)): TraceSink {
  return {
    emit(event: TraceEvent) {
      write(JSON.stringify({ at: new Date().toISOString(), ...event }));
    },
  };
}

/** Fans one event out to several sinks. */
export function teeTraceSink(...sinks: TraceSink[]): TraceSink {
  return {
    emit(event: TraceEvent) {
      for (const s of sinks) s.emit(event);
    },
  };
}

/**
 * Wrap a dictionary store with logging.
 */
export function loggingStore(inner: MacroDictionaryStore, trace: TraceSink): MacroDictionaryStore {
  return {
    location: inner.location,
    async save(dictionary: MacroDictionary): Promise<Outcome<string>> {
      const start = Date.now();
      const res = await inner.save(dictionary);
      if (isDone(res)) {
        trace.emit({
          tag: "E_DictionarySaved",
          id: makeId("store"),
          location: res.value,
          version: dictionary.version,
          durationMs: Date.now() - start,
        });
      }
      return res;
    },
    async load(): Promise<Outcome<MacroDictionary | undefined>> {
      const start = Date.now();
      const res = await inner.load();
      if (isDone(res)) {
        trace.emit({
          tag: "E_DictionaryLoaded",
          id: makeId("store"),
          location: inner.location,
          found: res.value !== undefined,
          durationMs: Date.now() - start,
        });
      }
      return res;
    },
  };
}
