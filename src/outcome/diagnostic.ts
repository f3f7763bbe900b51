/** Half-open symbol range inside a word. */
export interface WordSpan {
  start: number;
  end: number;
}

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface DiagnosticFix {
  description: string;
  replacement?: string;
  span?: WordSpan;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: WordSpan;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
  fixes?: DiagnosticFix[];
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}
