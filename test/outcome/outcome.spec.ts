import { describe, it, expect } from "vitest";
import type { WordSpan } from "../../src/outcome/diagnostic";
import { isDone, isFail } from "../../src/outcome/outcome";
import { allDiagnostics, failure, isFailureReason, wrapFailure } from "../../src/outcome/failure";
import { errorDiag, warnDiag } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import {
  budgetExceeded,
  diagnosed,
  done,
  err,
  fail,
  invariantViolated,
  ioError,
  ok,
  schemaMismatch,
  validationFailed,
} from "../../src/outcome/constructors";
import { flatMapOutcome, mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";

const sampleSpan: WordSpan = { start: 2, end: 4 };

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const meta = { span: sampleSpan, durationMs: 12, budgetUsed: { iterations: 3 } };
    const outcome = done("value", meta);
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual(meta);
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = errorDiag("E0001", "err");
    const failureObj = failure("io-error", "disk gone", {
      diagnostics: [diag],
      recoverable: true,
    });
    const outcome = fail(failureObj, { durationMs: 5 });
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure).toBe(failureObj);
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.meta.durationMs).toBe(5);
  });

  it("type guards discriminate outcome variants", () => {
    const doneOutcome = done(1);
    const failOutcome = fail(failure("internal-error", "boom"));

    expect(isDone(doneOutcome)).toBe(true);
    expect(isFail(doneOutcome)).toBe(false);
    expect(isFail(failOutcome)).toBe(true);
    expect(isDone(failOutcome)).toBe(false);
  });

  it("pattern matches outcomes exhaustively", () => {
    const doneResult = match(done("ok"), {
      done: d => `done:${d.value}`,
      fail: f => `fail:${f.failure.message}`,
    });
    expect(doneResult).toBe("done:ok");

    const failResult = match(fail(failure("validation-failed", "bad input")), {
      done: () => "nope",
      fail: f => f.failure.reason,
    });
    expect(failResult).toBe("validation-failed");
  });

  it("maps and flatMaps over successful outcomes only", async () => {
    const doneOutcome = done(2);
    const mapped = mapOutcome(doneOutcome, n => n * 2);
    expect(isDone(mapped)).toBe(true);
    if (isDone(mapped)) {
      expect(mapped.value).toBe(4);
    }

    const failOutcome = fail(failure("internal-error", "bad"));
    const untouched = mapOutcome(failOutcome, () => "ignored");
    expect(untouched).toBe(failOutcome);

    const flatMapped = await flatMapOutcome(doneOutcome, async n => done(n + 1));
    expect(isDone(flatMapped)).toBe(true);
    if (isDone(flatMapped)) {
      expect(flatMapped.value).toBe(3);
    }

    const passthrough = await flatMapOutcome(failOutcome, async () => done("never"));
    expect(passthrough).toBe(failOutcome);
  });

  it("unwraps successes and throws on failures", () => {
    expect(unwrap(done("value"))).toBe("value");

    const failing = fail(failure("internal-error", "boom"));
    expect(() => unwrap(failing)).toThrow("boom");
    expect(unwrapOr(failing, "fallback")).toBe("fallback");
  });
});

describe("Failure", () => {
  it("defaults diagnostics and recoverable flags", () => {
    const f = failure("validation-failed", "bad input");
    expect(f.diagnostics).toEqual([]);
    expect(f.recoverable).toBe(false);
  });

  it("wraps failures and merges context while preserving causes", () => {
    const diag = errorDiag("E0400", "schema failed");
    const inner = failure("schema-mismatch", "inner", {
      diagnostics: [diag],
      context: { field: "version" },
      recoverable: true,
    });
    const outer = wrapFailure(inner, "outer", { attempt: 1 });

    expect(outer.cause).toBe(inner);
    expect(outer.context).toMatchObject({ field: "version", attempt: 1 });
    expect(outer.recoverable).toBe(true);
    expect(isFailureReason(outer, "schema-mismatch")).toBe(true);

    const diags = allDiagnostics(outer);
    expect(diags).toEqual([diag]);
  });

  it("accepts custom reasons", () => {
    const f = failure("custom:pool-exhausted", "no symbols left");
    expect(isFailureReason(f, "custom:pool-exhausted")).toBe(true);
  });
});

describe("Diagnostics and codes", () => {
  it("creates diagnostics with interpolation and severity", () => {
    const diag = makeDiagnostic("E0301", { resource: "expansion" }, sampleSpan);
    expect(diag.code).toBe("E0301");
    expect(diag.severity).toBe("error");
    expect(diag.message).toBe("Budget exhausted: expansion");
    expect(diag.span).toEqual(sampleSpan);
    expect(diag.data).toEqual({ resource: "expansion" });
  });

  it("interpolates several parameters", () => {
    const diag = makeDiagnostic("E0205", { actual: 3, expected: 2 });
    expect(diag.message).toBe("Dictionary version is 3, expected 2");
  });

  it("creates warning diagnostics", () => {
    const diag = warnDiag("W0001", "careful", { data: { iterations: 3 } });
    expect(diag.severity).toBe("warning");
    expect(diag.data).toMatchObject({ iterations: 3 });
  });

  it("exposes all diagnostic codes", () => {
    const codes = Object.keys(DIAGNOSTIC_CODES);
    expect(codes).toContain("E0101");
    expect(codes).toContain("E0502");
    expect(codes).toContain("W0002");
    expect(DIAGNOSTIC_CODES.W0001.severity).toBe("warning");
  });
});

describe("Outcome constructor helpers", () => {
  it("creates recoverable budget failures", () => {
    const budget = budgetExceeded("expansion", { budgetUsed: { iterations: 100 } });
    expect(budget.failure.reason).toBe("budget-exceeded");
    expect(budget.failure.message).toBe("Budget exhausted: expansion");
    expect(budget.failure.diagnostics[0]?.code).toBe("E0301");
    expect(budget.failure.recoverable).toBe(true);
    expect(budget.meta.budgetUsed?.iterations).toBe(100);
  });

  it("creates failures from the code table", () => {
    const conflict = diagnosed("version-conflict", "E0205", { actual: 3, expected: 2 });
    expect(conflict.failure.reason).toBe("version-conflict");
    expect(conflict.failure.message).toBe("Dictionary version is 3, expected 2");
    expect(conflict.failure.recoverable).toBe(false);
  });

  it("creates validation and schema failures", () => {
    const validation = validationFailed("invalid", { field: "depth" });
    expect(validation.failure.reason).toBe("validation-failed");
    expect(validation.failure.diagnostics[0]?.code).toBe("E0400");
    expect(validation.failure.context).toMatchObject({ field: "depth" });
    expect(validation.failure.recoverable).toBe(true);

    const schema = schemaMismatch("wrong shape");
    expect(schema.failure.reason).toBe("schema-mismatch");
    expect(schema.failure.recoverable).toBe(false);
  });

  it("creates io failures naming the path", () => {
    const io = ioError("write", "/data/macros.json", new Error("EACCES"));
    expect(io.failure.reason).toBe("io-error");
    expect(io.failure.message).toBe("Cannot write /data/macros.json: EACCES");
    expect(io.failure.diagnostics[0]?.code).toBe("E0501");
    expect(io.failure.context).toEqual({ path: "/data/macros.json" });

    const read = ioError("read", "/data/macros.json", "gone");
    expect(read.failure.message).toBe("Cannot read /data/macros.json: gone");
  });

  it("creates invariant failures", () => {
    const broken = invariantViolated("levels overlap", { level: 2 });
    expect(broken.failure.reason).toBe("invariant-violated");
    expect(broken.failure.context).toEqual({ level: 2 });
  });

  it("aliases ok/err for success/failure outcomes", () => {
    const success = ok(9);
    expect(success.tag).toBe("Done");

    const failureOutcome = err("internal-error", "boom");
    expect(failureOutcome.tag).toBe("Fail");
    expect(failureOutcome.failure.reason).toBe("internal-error");
    expect(failureOutcome.failure.message).toBe("boom");
  });
});
