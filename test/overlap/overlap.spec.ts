import { describe, it, expect } from "vitest";
import { word, words } from "../../src/core/words/word";
import { parseRules } from "../../src/core/words/rule";
import { AhoCorasick } from "../../src/core/overlap/ahoCorasick";
import { OverlapDetector, describeOverlap } from "../../src/core/overlap/detector";

const PATTERNS = ["00", "0|", "000", "|0"];

describe("AhoCorasick", () => {
  it("reports overlapping and nested matches in one pass", () => {
    const ac = new AhoCorasick(PATTERNS);
    const hits = ac.search("00|000|0").map(m => `${m.start}:${m.pattern}`);
    expect(hits).toEqual(["0:00", "1:0|", "2:|0", "3:00", "3:000", "4:00", "5:0|", "6:|0"]);
  });

  it("collects start positions per pattern", () => {
    const ac = new AhoCorasick(PATTERNS);
    const positions = ac.findAllPositions(word("00|000|0"));
    expect(positions.get("00")).toEqual([0, 3, 4]);
    expect(positions.get("0|")).toEqual([1, 5]);
    expect(positions.get("000")).toEqual([3]);
    expect(positions.get("|0")).toEqual([2, 6]);
  });

  it("agrees with a naive scan", () => {
    const text = "0|00|000||0|0";
    const ac = new AhoCorasick(PATTERNS);
    const positions = ac.findAllPositions(text);
    for (const p of PATTERNS) {
      const naive: number[] = [];
      for (let i = 0; i + p.length <= text.length; i++) {
        if (text.startsWith(p, i)) naive.push(i);
      }
      expect(positions.get(p)).toEqual(naive);
    }
  });

  it("rebuilds after patterns are added", () => {
    const ac = new AhoCorasick(["00"]);
    expect(ac.search("0|0").length).toBe(0);
    ac.addPattern("|");
    expect(ac.search("0|0").map(m => m.pattern)).toEqual(["|"]);
    expect(ac.patternCount).toBe(2);
  });

  it("ignores empty patterns and absent ones map to nothing", () => {
    const ac = new AhoCorasick(["", "||"]);
    expect(ac.patternCount).toBe(1);
    expect(ac.findAllPositions("0|0").get("||")).toEqual([]);
  });
});

describe("OverlapDetector", () => {
  it("finds the longest suffix/prefix overlap", () => {
    const o = OverlapDetector.findSuffixPrefixOverlap(word("000"), word("00"));
    expect(o?.length).toBe(2);
    expect(o?.overlap.content).toBe("00");
    expect(o && describeOverlap(o)).toBe("000 ∩ 00 = '00' (len=2)");

    expect(OverlapDetector.findSuffixPrefixOverlap(word("0|"), word("|0"))?.length).toBe(1);
    expect(OverlapDetector.findSuffixPrefixOverlap(word("00"), word("|0"))).toBeUndefined();
  });

  it("lists overlaps between distinct positions", () => {
    const overlaps = OverlapDetector.findAllOverlaps(words("00", "0|", "000"), 2);
    expect(overlaps.map(o => `${o.first.content}/${o.second.content}`)).toEqual(["00/000", "000/00"]);
  });

  it("checks M-locality monotonically", () => {
    const rules = parseRules("00 -> 0; 0| -> |0; 000 -> 00");
    expect(OverlapDetector.maxOverlap(rules)).toBe(2);
    expect(OverlapDetector.checkMLocality(rules, 1)).toBe(false);
    expect(OverlapDetector.checkMLocality(rules, 2)).toBe(true);
    expect(OverlapDetector.checkMLocality(rules, 3)).toBe(true);
  });

  it("has no overlap for a single rule or disjoint sides", () => {
    expect(OverlapDetector.maxOverlap(parseRules("00 -> 0"))).toBe(0);
    expect(OverlapDetector.maxOverlap(parseRules("00 -> 0; || -> |"))).toBe(0);
  });

  it("glues suffixes onto prefixes", () => {
    expect(OverlapDetector.superpositions(word("0|"), word("|0")).map(w => w.content)).toEqual(["0|0"]);
    expect(OverlapDetector.superpositions(word("000"), word("00")).map(w => w.content)).toEqual(["0000"]);
    expect(OverlapDetector.superpositions(word("00"), word("000")).map(w => w.content)).toEqual(["0000", "000"]);
  });
});
