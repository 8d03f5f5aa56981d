// src/core/forms/fn.ts
// Function literal: (fn name? [params] body...) | (fn name? ([params] body...) ...)

import type { ListNode, SyntaxNode } from "../syntax/node";
import { isListForm, isOrderedSequence, isSymbol, list, printNode, sym } from "../syntax/node";
import { DEFAULT_CONFIG } from "../config/config";
import { buildClause, parseClause } from "./clause";
import { makeInvalidArgumentError } from "./errors";
import { extractPrefix } from "./prefix";
import { resolveTrace } from "./trace";
import type { Clause, ClauseContext, FormOptions, NonEmpty, ParsedFn } from "./types";

/**
 * Resolve single- vs multi-clause shape and parse every clause.
 *
 * A leading parameter vector means the whole remainder is one clause;
 * a leading list means each element is its own clause. The choice is made
 * here, once, and every clause reports errors under it.
 */
export function parseClauses(rest: readonly SyntaxNode[], opts?: FormOptions): NonEmpty<Clause> {
  const log = resolveTrace(opts);
  const [first, ...others] = rest;

  if (first === undefined || !(isOrderedSequence(first) || isListForm(first))) {
    throw makeInvalidArgumentError("parameter declaration missing", "MissingParameters", first);
  }

  if (isOrderedSequence(first)) {
    const context: ClauseContext = "single-clause";
    log("clauses: single-clause", printNode(first));
    return [parseClause(list([...rest]), context, opts)];
  }

  const context: ClauseContext = "multi-clause";
  log("clauses: multi-clause", { count: rest.length });
  return [parseClause(first, context, opts), ...others.map((raw) => parseClause(raw, context, opts))];
}

export function parseFn(forms: readonly SyntaxNode[], opts?: FormOptions): ParsedFn {
  const [name, rest] = extractPrefix(forms, (s) => sym(s.name), isSymbol, undefined);
  if (name) resolveTrace(opts)("fn: name", name.name);

  const clauses = parseClauses(rest, opts);
  return name ? { name, clauses } : { clauses };
}

/** One clause is spliced in place; several are each wrapped in a list. */
export function buildClauseForms(clauses: readonly Clause[]): SyntaxNode[] {
  if (clauses.length === 1) {
    return clauses.flatMap(buildClause);
  }
  return clauses.map((c) => list(buildClause(c)));
}

export function buildFn(parsed: ParsedFn, opts?: FormOptions): ListNode {
  const head = (opts?.config ?? DEFAULT_CONFIG).forms.fnHead;
  return list([
    sym(head),
    ...(parsed.name ? [parsed.name] : []),
    ...buildClauseForms(parsed.clauses),
  ]);
}
