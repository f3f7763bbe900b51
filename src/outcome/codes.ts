import type { Diagnostic, DiagnosticSeverity, WordSpan } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0101: { code: "E0101", severity: "error", category: "Structure", template: "Symbol must be a single character: {value}" },
  E0102: { code: "E0102", severity: "error", category: "Structure", template: "Symbol not in alphabet: {symbol}" },
  E0103: { code: "E0103", severity: "error", category: "Structure", template: "Malformed rule: {text}" },

  E0201: { code: "E0201", severity: "error", category: "Macro", template: "Macro {symbol} is not verified" },
  E0202: { code: "E0202", severity: "error", category: "Macro", template: "Symbol already defined: {symbol}" },
  E0203: { code: "E0203", severity: "error", category: "Macro", template: "Definition already lifted: {definition}" },
  E0204: { code: "E0204", severity: "error", category: "Macro", template: "Macro {symbol} refers to itself" },
  E0205: { code: "E0205", severity: "error", category: "Macro", template: "Dictionary version is {actual}, expected {expected}" },
  E0206: { code: "E0206", severity: "error", category: "Macro", template: "Macro definition is empty" },

  E0301: { code: "E0301", severity: "error", category: "Budget", template: "Budget exhausted: {resource}" },

  E0400: { code: "E0400", severity: "error", category: "Validation", template: "Schema validation failed" },
  E0401: { code: "E0401", severity: "error", category: "Validation", template: "Invalid value for field: {field}" },

  E0501: { code: "E0501", severity: "error", category: "Persistence", template: "Cannot write {path}" },
  E0502: { code: "E0502", severity: "error", category: "Persistence", template: "Cannot read {path}" },

  W0001: { code: "W0001", severity: "warning", category: "Budget", template: "Expansion stopped after {iterations} iterations" },
  W0002: { code: "W0002", severity: "warning", category: "Budget", template: "No cycle within {steps} steps; limit is approximate" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: WordSpan
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
