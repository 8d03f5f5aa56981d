import { describe, it, expect } from "vitest";
import { isDone, isFail, type Outcome } from "../../src/outcome/outcome";
import { failure } from "../../src/outcome/failure";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import { done, fail, readError, syntaxError } from "../../src/outcome/constructors";
import { mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";
import * as outcome from "../../src/outcome";

describe("Outcome ADT", () => {
  it("constructs Done with default meta", () => {
    const o = done(42);
    expect(o).toEqual({ tag: "Done", value: 42, meta: {} });
    expect(isDone(o)).toBe(true);
    expect(isFail(o)).toBe(false);
  });

  it("constructs Fail from a failure", () => {
    const o = fail(failure("syntax-error", "bad form", { recoverable: true }));
    expect(isFail(o)).toBe(true);
    expect(o.meta).toEqual({});
    expect(o.failure).toEqual({
      reason: "syntax-error",
      message: "bad form",
      diagnostics: [],
      recoverable: true,
      context: undefined,
    });
  });

  it("builds syntax errors with one diagnostic", () => {
    const o = syntaxError("E0011", "parameter declaration missing", "f", { form: "fn" });
    expect(o.meta).toEqual({ form: "fn" });
    expect(o.failure.reason).toBe("syntax-error");
    expect(o.failure.context).toEqual({ form: "f" });
    expect(o.failure.diagnostics).toEqual([
      {
        code: "E0011",
        severity: "error",
        message: "Parameter declaration missing",
        form: "f",
        data: undefined,
      },
    ]);
  });

  it("builds read errors", () => {
    const o = readError("read: unexpected EOF");
    expect(o.failure.reason).toBe("read-error");
    expect(o.failure.diagnostics[0]?.message).toBe("Malformed expression: read: unexpected EOF");
  });
});

describe("diagnostics", () => {
  it("fills templates", () => {
    expect(makeDiagnostic("E0014", { head: "fn" }).message).toBe("Expected a (fn ...) form");
  });

  it("rejects unknown codes", () => {
    expect(() => makeDiagnostic("E9999")).toThrow("Unknown diagnostic code: E9999");
  });

  it("keeps every code keyed by itself", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
    }
  });
});

describe("outcome barrel", () => {
  it("exports only the helpers the parsers use", () => {
    const names = Object.keys(outcome);
    for (const kept of ["done", "fail", "failure", "syntaxError", "readError", "makeDiagnostic"]) {
      expect(names).toContain(kept);
    }
    for (const dropped of ["ok", "err", "wrapFailure", "isFailureReason", "allDiagnostics", "errorDiag", "warnDiag"]) {
      expect(names).not.toContain(dropped);
    }
  });

  it("builds failures without a cause chain", () => {
    expect("cause" in failure("read-error", "eof")).toBe(false);
  });
});

describe("matchers", () => {
  it("matches on tag", () => {
    const show = (o: Outcome<number>) =>
      match(o, { done: (d) => `done ${d.value}`, fail: (f) => `fail ${f.failure.message}` });
    expect(show(done(1))).toBe("done 1");
    expect(show(fail(failure("read-error", "eof")))).toBe("fail eof");
  });

  it("maps only Done values", () => {
    expect(mapOutcome(done(2), (n) => n * 3)).toEqual(done(6));
    const f = fail(failure("read-error", "eof"));
    expect(mapOutcome(f, (n: number) => n * 3)).toBe(f);
  });

  it("unwraps", () => {
    expect(unwrap(done("v"))).toBe("v");
    expect(() => unwrap(fail(failure("syntax-error", "nope")))).toThrow("nope");
    expect(unwrapOr(fail(failure("syntax-error", "nope")), "fallback")).toBe("fallback");
  });
});
