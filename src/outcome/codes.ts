import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES: Record<string, DiagCodeDef> = {
  E0001: { code: "E0001", severity: "error", category: "Read", template: "Malformed expression: {detail}" },

  E0010: { code: "E0010", severity: "error", category: "Form", template: "Definition name is not a symbol" },
  E0011: { code: "E0011", severity: "error", category: "Form", template: "Parameter declaration missing" },
  E0012: { code: "E0012", severity: "error", category: "Form", template: "Clause parameters are not an ordered sequence" },
  E0013: { code: "E0013", severity: "error", category: "Form", template: "Single-clause signature is not a list" },
  E0014: { code: "E0014", severity: "error", category: "Form", template: "Expected a ({head} ...) form" },
};

export function makeDiagnostic(
  code: keyof typeof DIAGNOSTIC_CODES,
  params?: Record<string, string | number>,
  form?: string
): Diagnostic {
  const def = DIAGNOSTIC_CODES[code];
  if (!def) {
    throw new Error(`Unknown diagnostic code: ${String(code)}`);
  }

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
    form,
    data: params,
  };
}
