// src/core/forms/index.ts
// Function-form parsing and building

export type { Clause, ClauseContext, FormOptions, NonEmpty, ParsedDefn, ParsedFn } from "./types";
export type { TraceLog } from "./trace";
export { resolveTrace } from "./trace";
export {
  type FormErrorKind,
  FormSyntaxError,
  makeInvalidArgumentError,
  isFormSyntaxError,
  diagnosticCode,
} from "./errors";
export { type Prefixed, extractPrefix } from "./prefix";
export { parseClause, buildClause } from "./clause";
export { parseFn, parseClauses, buildFn, buildClauseForms } from "./fn";
export { parseDefn, buildDefn } from "./defn";
export {
  formArgs,
  parseFnForm,
  parseDefnForm,
  tryParseFn,
  tryParseDefn,
  tryParseFnForm,
  tryParseDefnForm,
} from "./form";
