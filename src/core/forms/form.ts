// src/core/forms/form.ts
// Whole-form entry points and Outcome-returning variants

import type { SyntaxNode } from "../syntax/node";
import { isListForm, isSymbol, printNode } from "../syntax/node";
import { DEFAULT_CONFIG } from "../config/config";
import type { Outcome } from "../../outcome/outcome";
import { done, syntaxError } from "../../outcome/constructors";
import { diagnosticCode, isFormSyntaxError, makeInvalidArgumentError } from "./errors";
import { parseDefn } from "./defn";
import { parseFn } from "./fn";
import type { FormOptions, ParsedDefn, ParsedFn } from "./types";

/** Strip `(head ...)` and return the arguments; any other shape is an UnexpectedHead. */
export function formArgs(node: SyntaxNode, head: string): SyntaxNode[] {
  if (isListForm(node)) {
    const [first, ...args] = node.items;
    if (first !== undefined && isSymbol(first) && first.name === head) return args;
  }
  throw makeInvalidArgumentError(`expected a (${head} ...) form, got ${printNode(node)}`, "UnexpectedHead", node);
}

export function parseFnForm(node: SyntaxNode, opts?: FormOptions): ParsedFn {
  return parseFn(formArgs(node, (opts?.config ?? DEFAULT_CONFIG).forms.fnHead), opts);
}

export function parseDefnForm(node: SyntaxNode, opts?: FormOptions): ParsedDefn {
  return parseDefn(formArgs(node, (opts?.config ?? DEFAULT_CONFIG).forms.defnHead), opts);
}

function attempt<A>(form: string, run: () => A): Outcome<A> {
  try {
    return done(run(), { form });
  } catch (e) {
    if (!isFormSyntaxError(e)) throw e;
    return syntaxError(diagnosticCode(e), e.message, e.form && printNode(e.form), { form });
  }
}

export function tryParseFn(forms: readonly SyntaxNode[], opts?: FormOptions): Outcome<ParsedFn> {
  return attempt((opts?.config ?? DEFAULT_CONFIG).forms.fnHead, () => parseFn(forms, opts));
}

export function tryParseDefn(forms: readonly SyntaxNode[], opts?: FormOptions): Outcome<ParsedDefn> {
  return attempt((opts?.config ?? DEFAULT_CONFIG).forms.defnHead, () => parseDefn(forms, opts));
}

export function tryParseFnForm(node: SyntaxNode, opts?: FormOptions): Outcome<ParsedFn> {
  return attempt((opts?.config ?? DEFAULT_CONFIG).forms.fnHead, () => parseFnForm(node, opts));
}

export function tryParseDefnForm(node: SyntaxNode, opts?: FormOptions): Outcome<ParsedDefn> {
  return attempt((opts?.config ?? DEFAULT_CONFIG).forms.defnHead, () => parseDefnForm(node, opts));
}
