import { describe, it, expect } from "vitest";
import { word } from "../../src/core/words/word";
import { Rule, parseRules } from "../../src/core/words/rule";
import { RewritingEngine, reachedWords } from "../../src/core/rewriting/engine";
import { isFound, limitWords } from "../../src/core/rewriting/types";

const contents = (ws: readonly { content: string }[]) => ws.map(w => w.content);

// 00 ↔ 0|
const toggle = () => new RewritingEngine(parseRules("00 -> 0|; 0| -> 00"));

describe("RewritingEngine.findPositions", () => {
  it("finds every occurrence, overlapping ones included", () => {
    const engine = toggle();
    expect(engine.findPositions(word("00|00"), word("00"))).toEqual([0, 3]);
    expect(engine.findPositions(word("000"), word("00"))).toEqual([0, 1]);
    expect(engine.findPositions(word("|||"), word("0"))).toEqual([]);
  });

  it("matches an empty pattern at every position", () => {
    expect(toggle().findPositions(word("0|"), word(""))).toEqual([0, 1, 2]);
  });
});

describe("RewritingEngine.applyRule", () => {
  it("splices the right side over the match", () => {
    const engine = toggle();
    const result = engine.applyRule(word("00|00"), Rule.of("00", "0|"), 3);
    expect(result.content).toBe("00|0|");

    const grown = engine.applyRule(word("0|"), Rule.of("0", "000"), 0);
    expect(grown.length).toBe(2 - 1 + 3);
  });

  it("throws on a position past the end", () => {
    expect(() => toggle().applyRule(word("00"), Rule.of("00", "0"), 1)).toThrow(RangeError);
  });
});

describe("RewritingEngine.allApplications", () => {
  it("orders applications by rule, then position", () => {
    const apps = toggle().allApplications(word("00|0"));
    expect(apps.map(a => `${a.rule.id}@${a.position}=${a.result.content}`)).toEqual([
      "00→0|@0=0||0",
      "0|→00@1=0000",
    ]);
  });

  it("is empty for a normal form", () => {
    const engine = new RewritingEngine(parseRules("00 -> 0"));
    expect(engine.allApplications(word("0|0"))).toEqual([]);
    expect(engine.isNormalForm(word("0|0"))).toBe(true);
    expect(contents(engine.normalForms([word("0"), word("00"), word("|")]))).toEqual(["0", "|"]);
  });

  it("collapses duplicate results in successors", () => {
    const engine = new RewritingEngine(parseRules("0 -> |; 0 -> |"));
    expect(engine.allApplications(word("0")).length).toBe(2);
    expect(contents(engine.successors(word("0")))).toEqual(["|"]);
  });

  it("takes the first application in engine order", () => {
    const engine = new RewritingEngine(parseRules("0| -> 00; 00 -> 0|"));
    const first = engine.firstApplication(word("00|"));
    expect(first?.rule.id).toBe("0|→00");
    expect(first?.position).toBe(1);
    expect(first?.result.content).toBe("000");
  });

  it("extends with extra rules after the original ones", () => {
    const engine = toggle().extend([Rule.of("A", "0|")]);
    expect(engine.rules.map(r => r.id)).toEqual(["00→0|", "0|→00", "A→0|"]);
  });
});

describe("RewritingEngine.boundedReach", () => {
  it("stops at the visited set on a two-cycle", () => {
    const levels = toggle().boundedReach(word("00"), 2, 10);
    expect(contents(levels.get(0) ?? [])).toEqual(["00"]);
    expect(contents(levels.get(1) ?? [])).toEqual(["0|"]);
    expect(levels.has(2)).toBe(false);
  });

  it("expands only the first `width` applications", () => {
    const levels = toggle().boundedReach(word("000"), 1, 1);
    expect(contents(levels.get(1) ?? [])).toEqual(["0|0"]);
  });

  it("lists each word once across levels", () => {
    const levels = toggle().boundedReach(word("000"), 3);
    const all = contents(reachedWords(levels));
    expect(all).toEqual(["000", "0|0", "00|", "0||"]);
    expect(new Set(all).size).toBe(all.length);
  });
});

describe("RewritingEngine.reachable", () => {
  it("returns the first path found", () => {
    const result = toggle().reachable(word("000"), word("0||"), 3);
    expect(isFound(result)).toBe(true);
    if (result.tag === "Found") {
      expect(contents(result.path)).toEqual(["000", "00|", "0||"]);
    }
  });

  it("is found trivially at the start word", () => {
    const result = toggle().reachable(word("00"), word("00"), 0);
    expect(result).toEqual({ tag: "Found", path: [word("00")] });
  });

  it("reports how much was explored when nothing is found", () => {
    expect(toggle().reachable(word("0"), word("|"), 5)).toEqual({ tag: "NotFound", explored: 1 });
    expect(toggle().reachable(word("000"), word("0||"), 1)).toEqual({ tag: "NotFound", explored: 3 });
  });
});

describe("RewritingEngine.omegaLimit", () => {
  it("returns the cycle from its first occurrence", () => {
    const result = toggle().omegaLimit(word("00"));
    expect(result.tag).toBe("Cycle");
    if (result.tag === "Cycle") {
      expect(contents(result.cycle)).toEqual(["00", "0|"]);
      expect(result.entry).toBe(0);
    }
  });

  it("stops at a normal form", () => {
    const engine = new RewritingEngine(parseRules("00 -> 0"));
    const result = engine.omegaLimit(word("0000"));
    expect(result.tag).toBe("Terminal");
    if (result.tag === "Terminal") {
      expect(result.word.content).toBe("0");
      expect(result.steps).toBe(3);
    }
    expect(contents(limitWords(result))).toEqual(["0"]);
  });

  it("falls back to a trailing window without a cycle", () => {
    const engine = new RewritingEngine(parseRules("0 -> 00"));
    const result = engine.omegaLimit(word("0"), 5, 3);
    expect(result.tag).toBe("Approximate");
    expect(contents(limitWords(result))).toEqual(["000", "0000", "00000"]);
  });
});
