import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function syntaxError(
  code: string,
  message: string,
  form?: string,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("syntax-error", message, {
      diagnostics: [{ ...makeDiagnostic(code), form }],
      context: form === undefined ? undefined : { form },
      recoverable: false,
    }),
    meta
  );
}

export function readError(detail: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("read-error", detail, {
      diagnostics: [makeDiagnostic("E0001", { detail })],
      recoverable: false,
    }),
    meta
  );
}
