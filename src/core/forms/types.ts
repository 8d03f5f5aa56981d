// src/core/forms/types.ts
// Parsed shapes of function literals and named definitions

import type { MappingNode, SymbolNode, SyntaxNode } from "../syntax/node";
import type { FormsConfig } from "../config/config";
import type { TraceLog } from "./trace";

export type NonEmpty<T> = [T, ...T[]];

/**
 * Which clause shape the declaration was read as. Decided once from the
 * first form after the name and used for every clause's error message.
 */
export type ClauseContext = "single-clause" | "multi-clause";

/** One arity of a definition: `([params] {prepost}? body...)`. */
export interface Clause {
  params: SyntaxNode;
  prepost?: MappingNode;
  body: SyntaxNode[];
}

export interface ParsedFn {
  name?: SymbolNode;
  clauses: NonEmpty<Clause>;
}

export interface ParsedDefn {
  name: SymbolNode;
  metadata: MappingNode;
  clauses: NonEmpty<Clause>;
}

export type FormOptions = {
  config?: FormsConfig;
  log?: TraceLog;
};
