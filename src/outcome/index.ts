export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic } from "./codes";
export { done, fail, syntaxError, readError } from "./constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./matchers";
