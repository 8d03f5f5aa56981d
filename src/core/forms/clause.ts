// src/core/forms/clause.ts
// One arity: ([params] {prepost}? body...)

import type { SyntaxNode } from "../syntax/node";
import { cloneMapping, cloneNode, cloneSequence, isListForm, isMapping, isOrderedSequence, printNode } from "../syntax/node";
import { makeInvalidArgumentError } from "./errors";
import { extractPrefix } from "./prefix";
import { resolveTrace } from "./trace";
import type { Clause, ClauseContext, FormOptions } from "./types";

function malformed(context: ClauseContext, rawForm: SyntaxNode, params: SyntaxNode | undefined): Error {
  if (context === "single-clause") {
    return makeInvalidArgumentError(
      `invalid signature: ${printNode(rawForm)} should be a list`,
      "MalformedSignature",
      rawForm,
      context
    );
  }
  const shown = params === undefined ? "nil" : printNode(params);
  return makeInvalidArgumentError(
    `parameter declaration ${shown} should be an ordered sequence`,
    "MalformedSignature",
    params ?? rawForm,
    context
  );
}

/**
 * Parse one raw clause. `rawForm` is a list; only the single-clause case
 * also takes a vector. Nodes are copied out of the input.
 */
export function parseClause(rawForm: SyntaxNode, context: ClauseContext, opts?: FormOptions): Clause {
  if (!isListForm(rawForm) && !isOrderedSequence(rawForm)) {
    throw malformed(context, rawForm, rawForm);
  }
  if (isOrderedSequence(rawForm) && context === "multi-clause") {
    throw malformed(context, rawForm, rawForm);
  }

  const [params, ...rest] = rawForm.items;
  if (params === undefined || !isOrderedSequence(params)) {
    throw malformed(context, rawForm, params);
  }

  const [prepost, body] = extractPrefix(rest, cloneMapping, isMapping, undefined);
  if (prepost) resolveTrace(opts)("clause: pre/post map", printNode(prepost));

  const copied = { params: cloneSequence(params), body: body.map(cloneNode) };
  return prepost ? { ...copied, prepost } : copied;
}

export function buildClause(clause: Clause): SyntaxNode[] {
  return [clause.params, ...(clause.prepost ? [clause.prepost] : []), ...clause.body];
}
