// src/index.ts
// fn-forms - Public API
//
// Parse, inspect and rebuild function literals and named definitions
// held as code-as-data trees.

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTAX TREE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type SyntaxNode,
  type MapEntry,
  type OpaqueValue,
  type SymbolNode,
  type KeywordNode,
  type SequenceNode,
  type ListNode,
  type MappingNode,
  type StringNode,
  type OpaqueNode,
  sym,
  kw,
  vec,
  list,
  mapping,
  str,
  opaque,
  isSymbol,
  isKeyword,
  isOrderedSequence,
  isListForm,
  isMapping,
  isStringLiteral,
  isOpaque,
  mappingGet,
  mergeMappings,
  cloneNode,
  cloneSequence,
  cloneMapping,
  nodeEq,
  printNode,
} from "./core/syntax/node";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export { ReadError, readForm, readForms, tryReadForm } from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// FUNCTION FORMS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Clause,
  type ClauseContext,
  type FormOptions,
  type NonEmpty,
  type ParsedDefn,
  type ParsedFn,
  type TraceLog,
  type FormErrorKind,
  type Prefixed,
  FormSyntaxError,
  makeInvalidArgumentError,
  isFormSyntaxError,
  diagnosticCode,
  extractPrefix,
  parseClause,
  buildClause,
  parseFn,
  parseClauses,
  buildFn,
  buildClauseForms,
  parseDefn,
  buildDefn,
  parseFnForm,
  parseDefnForm,
  tryParseFn,
  tryParseDefn,
  tryParseFnForm,
  tryParseDefnForm,
} from "./core/forms";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, Failure, Diagnostic } from "./outcome";
export { isDone, isFail, match, mapOutcome, unwrap, unwrapOr } from "./outcome";

export {
  type FormsConfig,
  type PartialFormsConfig,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./core/config";
