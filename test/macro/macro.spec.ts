import { describe, it, expect } from "vitest";
import { Sym } from "../../src/core/words/symbol";
import { word } from "../../src/core/words/word";
import { Macro, createMacro } from "../../src/core/macro/macro";
import { isDone, isFail } from "../../src/outcome/outcome";

const A = Sym.of("A");

describe("Macro", () => {
  it("pairs an introduction and an elimination rule", () => {
    const m = new Macro(A, word("0|"));
    expect(m.introduction.id).toBe("A→0|");
    expect(m.elimination.id).toBe("0|→A");
    expect(m.rules.map(r => r.id)).toEqual(["A→0|", "0|→A"]);
    expect(m.introduction.metadata).toEqual({ macro: "A", role: "introduction" });
  });

  it("starts unverified and verifies into a copy", () => {
    const m = new Macro(A, word("0|"), false, { source: "test" });
    const v = m.markVerified({ checkedAt: 1 });
    expect(m.verified).toBe(false);
    expect(m.describe()).toBe("A := 0| ?");
    expect(v.verified).toBe(true);
    expect(v.describe()).toBe("A := 0| ✓");
    expect(v.metadata).toEqual({ source: "test", checkedAt: 1 });
  });
});

describe("createMacro", () => {
  it("creates an unverified macro", () => {
    const created = createMacro(A, word("00"), { frequency: 4 });
    expect(isDone(created)).toBe(true);
    if (isDone(created)) {
      expect(created.value.verified).toBe(false);
      expect(created.value.metadata).toEqual({ frequency: 4 });
    }
  });

  it("refuses a definition containing its own symbol", () => {
    const created = createMacro(A, word("0A"));
    expect(isFail(created)).toBe(true);
    if (isFail(created)) {
      expect(created.failure.reason).toBe("self-referential-macro");
      expect(created.failure.message).toBe("Macro A refers to itself");
      expect(created.failure.diagnostics[0]?.code).toBe("E0204");
    }
  });

  it("refuses an empty definition", () => {
    const created = createMacro(A, word(""));
    expect(isFail(created)).toBe(true);
    if (isFail(created)) {
      expect(created.failure.reason).toBe("validation-failed");
      expect(created.failure.diagnostics[0]?.code).toBe("E0206");
    }
  });
});
