// src/core/forms/errors.ts
// Failures raised while parsing function forms

import type { SyntaxNode } from "../syntax/node";
import type { ClauseContext } from "./types";

export type FormErrorKind =
  | "MissingName"
  | "MissingParameters"
  | "MalformedSignature"
  | "UnexpectedHead";

export class FormSyntaxError extends Error {
  constructor(
    message: string,
    public readonly kind: FormErrorKind,
    public readonly form?: SyntaxNode,
    public readonly context?: ClauseContext
  ) {
    super(message);
    this.name = "FormSyntaxError";
  }
}

/** The single factory every parse failure goes through. */
export function makeInvalidArgumentError(
  message: string,
  kind: FormErrorKind,
  form?: SyntaxNode,
  context?: ClauseContext
): FormSyntaxError {
  return new FormSyntaxError(message, kind, form, context);
}

export function isFormSyntaxError(e: unknown): e is FormSyntaxError {
  return e instanceof FormSyntaxError;
}

/** Diagnostic code for an error; malformed signatures split by clause context. */
export function diagnosticCode(e: FormSyntaxError): string {
  switch (e.kind) {
    case "MissingName": return "E0010";
    case "MissingParameters": return "E0011";
    case "MalformedSignature": return e.context === "single-clause" ? "E0013" : "E0012";
    case "UnexpectedHead": return "E0014";
  }
}
