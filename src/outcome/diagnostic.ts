export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Printed form the diagnostic refers to */
  form?: string;
  data?: Record<string, unknown>;
}
