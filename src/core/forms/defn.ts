// src/core/forms/defn.ts
// Named definition: (defn name "doc"? {meta}? clauses...)

import type { ListNode, MappingNode, SyntaxNode } from "../syntax/node";
import { cloneMapping, isMapping, isStringLiteral, isSymbol, kw, list, mapping, mergeMappings, printNode, str, sym } from "../syntax/node";
import { DEFAULT_CONFIG } from "../config/config";
import { makeInvalidArgumentError } from "./errors";
import { buildClauseForms, parseClauses } from "./fn";
import { extractPrefix } from "./prefix";
import { resolveTrace } from "./trace";
import type { FormOptions, ParsedDefn } from "./types";

export function parseDefn(forms: readonly SyntaxNode[], opts?: FormOptions): ParsedDefn {
  const config = opts?.config ?? DEFAULT_CONFIG;
  const log = resolveTrace(opts);

  const [name, ...afterName] = forms;
  if (name === undefined || !isSymbol(name)) {
    throw makeInvalidArgumentError(
      `first argument to ${config.forms.defnHead} must be a symbol`,
      "MissingName",
      name
    );
  }

  const docKey = kw(config.forms.docKey);
  const [seeded, afterDoc] = extractPrefix(
    afterName,
    (doc) => mapping([[docKey, str(doc.value)]]),
    isStringLiteral,
    mapping()
  );
  const [metadata, rest] = extractPrefix(
    afterDoc,
    (m): MappingNode => mergeMappings(seeded, cloneMapping(m)),
    isMapping,
    seeded
  );
  if (metadata.entries.length > 0) log("defn: metadata", printNode(metadata));

  return { name: sym(name.name), metadata, clauses: parseClauses(rest, opts) };
}

/** Metadata always comes back as one map; a docstring is not split out again. */
export function buildDefn(parsed: ParsedDefn, opts?: FormOptions): ListNode {
  const head = (opts?.config ?? DEFAULT_CONFIG).forms.defnHead;
  const meta: SyntaxNode[] = parsed.metadata.entries.length > 0 ? [parsed.metadata] : [];
  return list([sym(head), parsed.name, ...meta, ...buildClauseForms(parsed.clauses)]);
}
