import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic, type DiagnosticCode } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  failureOrReason: Failure | FailureReason,
  messageOrMeta?: string | OutcomeMeta,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  const finalMeta = typeof messageOrMeta === "object" ? messageOrMeta : meta;
  if (typeof failureOrReason === "string") {
    const message = typeof messageOrMeta === "string" ? messageOrMeta : "";
    return fail(failure(failureOrReason, message, opts), finalMeta);
  }
  return fail(failureOrReason, finalMeta);
}

/** Fail carrying one diagnostic from the code table. */
export function diagnosed(
  reason: FailureReason,
  code: DiagnosticCode,
  params: Record<string, string | number> = {},
  opts?: { recoverable?: boolean; context?: Record<string, unknown> },
  meta: OutcomeMeta = {}
): Fail {
  const diag = makeDiagnostic(code, params);
  return fail(
    failure(reason, diag.message, {
      diagnostics: [diag],
      recoverable: opts?.recoverable ?? false,
      context: opts?.context,
    }),
    meta
  );
}

export function budgetExceeded(resource: string, meta: OutcomeMeta = {}): Fail {
  return diagnosed("budget-exceeded", "E0301", { resource }, { recoverable: true }, meta);
}

export function validationFailed(
  message: string,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("validation-failed", message, {
      diagnostics: [makeDiagnostic("E0400")],
      context,
      recoverable: true,
    }),
    meta
  );
}

export function schemaMismatch(
  message: string,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("schema-mismatch", message, {
      diagnostics: [makeDiagnostic("E0400")],
      context,
      recoverable: false,
    }),
    meta
  );
}

export function ioError(
  op: "read" | "write",
  path: string,
  cause: unknown,
  meta: OutcomeMeta = {}
): Fail {
  const detail = cause instanceof Error ? cause.message : String(cause);
  const diag = makeDiagnostic(op === "write" ? "E0501" : "E0502", { path });
  return fail(
    failure("io-error", `${diag.message}: ${detail}`, {
      diagnostics: [diag],
      context: { path },
      recoverable: true,
    }),
    meta
  );
}

export function invariantViolated(message: string, context?: Record<string, unknown>): Fail {
  return fail(failure("invariant-violated", message, { context, recoverable: false }));
}
