// test/core/forms/fn.spec.ts
// Tests for function literal parsing and building

import { describe, it, expect } from "vitest";
import { buildFn, parseFn } from "../../../src/core/forms/fn";
import { FormSyntaxError } from "../../../src/core/forms/errors";
import type { ParsedFn } from "../../../src/core/forms/types";
import { readForm, readForms } from "../../../src/core/reader";
import { isOrderedSequence, list, mapping, nodeEq, printNode, sym, vec } from "../../../src/core/syntax/node";
import { mergeConfigs } from "../../../src/core/config/config";

function fnArgs(src: string) {
  return readForms(src);
}

function caught(run: () => unknown): FormSyntaxError {
  try {
    run();
  } catch (e) {
    if (e instanceof FormSyntaxError) return e;
    throw e;
  }
  throw new Error("expected a FormSyntaxError");
}

describe("parseFn", () => {
  it("parses an unnamed single-clause literal", () => {
    const parsed = parseFn(fnArgs("[x] (+ x 1)"));
    expect(parsed).toEqual({
      clauses: [{ params: vec([sym("x")]), body: [readForm("(+ x 1)")] }],
    });
    expect(parsed.name).toBeUndefined();
  });

  it("parses a named literal", () => {
    const parsed = parseFn(fnArgs("step [acc x] (conj acc x)"));
    expect(parsed.name).toEqual(sym("step"));
    expect(printNode(parsed.clauses[0].params)).toBe("[acc x]");
  });

  it("parses multiple clauses in order", () => {
    const parsed = parseFn(fnArgs("([] 0) ([a] 1) ([a b] {:post [(pos? %)]} 2)"));
    expect(parsed.clauses.map((c) => printNode(c.params))).toEqual(["[]", "[a]", "[a b]"]);
    expect(parsed.clauses[0].prepost).toBeUndefined();
    expect(parsed.clauses[1].prepost).toBeUndefined();
    const third = parsed.clauses[2];
    expect(third.prepost && printNode(third.prepost)).toBe("{:post [(pos? %)]}");
    expect(third.body.map(printNode)).toEqual(["2"]);
  });

  it("treats a map after a single-clause vector as the pre/post map", () => {
    const parsed = parseFn(fnArgs("[x] {:pre [(number? x)]} x"));
    expect(parsed.clauses).toHaveLength(1);
    expect(parsed.clauses[0].prepost).toEqual(readForm("{:pre [(number? x)]}"));
  });

  it("fails with MissingParameters when nothing follows the name", () => {
    const e = caught(() => parseFn(fnArgs("f")));
    expect(e.kind).toBe("MissingParameters");
    expect(e.message).toBe("parameter declaration missing");
  });

  it("fails with MissingParameters when an atom follows the name", () => {
    const e = caught(() => parseFn(fnArgs("f 42 x")));
    expect(e.kind).toBe("MissingParameters");
    expect(printNode(e.form ?? list([]))).toBe("42");
  });

  it("fails with MissingParameters on a map in parameter position", () => {
    expect(caught(() => parseFn(fnArgs("{:a 1} x"))).kind).toBe("MissingParameters");
  });

  it("labels a bad later clause with the multi-clause message", () => {
    const e = caught(() => parseFn(fnArgs("([a] 1) (b 2)")));
    expect(e.kind).toBe("MalformedSignature");
    expect(e.context).toBe("multi-clause");
    expect(e.message).toBe("parameter declaration b should be an ordered sequence");
  });

  it("rejects a vector among clause lists", () => {
    const e = caught(() => parseFn(fnArgs("([a] 1) [b] 2")));
    expect(e.kind).toBe("MalformedSignature");
    expect(e.message).toBe("parameter declaration [b] should be an ordered sequence");
  });

  it("rejects a vector clause even when it starts with a parameter vector", () => {
    const e = caught(() => parseFn(fnArgs("([a] 1) [[b] 2]")));
    expect(e.kind).toBe("MalformedSignature");
    expect(e.context).toBe("multi-clause");
    expect(e.message).toBe("parameter declaration [[b] 2] should be an ordered sequence");
  });

  it("labels a bare atom among clause lists by itself", () => {
    const e = caught(() => parseFn(fnArgs("([a] 1) 2")));
    expect(e.message).toBe("parameter declaration 2 should be an ordered sequence");
  });

  it("reports the chosen clause shape to the logger", () => {
    const lines: string[] = [];
    parseFn(fnArgs("inc ([x] (+ x 1))"), { log: (msg) => lines.push(msg) });
    expect(lines).toEqual(["fn: name", "clauses: multi-clause"]);
  });

  it("copies clause bodies out of the input", () => {
    const input = fnArgs("[x] x");
    const parsed = parseFn(input);
    parsed.clauses[0].body.push(sym("extra"));
    expect(input).toHaveLength(2);
  });

  it("returns nodes that are not shared with the input", () => {
    const input = fnArgs("inc [x] {:pre [x]} (+ x 1)");
    const parsed = parseFn(input);
    const [clause] = parsed.clauses;
    expect(parsed.name).toEqual(input[0]);
    expect(parsed.name).not.toBe(input[0]);
    expect(clause.params).toEqual(input[1]);
    expect(clause.params).not.toBe(input[1]);
    expect(clause.prepost).not.toBe(input[2]);
    expect(clause.body[0]).not.toBe(input[3]);
  });

  it("leaves the input alone when a parsed value is rebuilt with extra params", () => {
    const input = fnArgs("[x] (+ x 1)");
    const parsed = parseFn(input);
    const [clause] = parsed.clauses;
    const { params } = clause;
    expect(isOrderedSequence(params)).toBe(true);
    const items = isOrderedSequence(params) ? params.items : [];
    const widened = buildFn({ clauses: [{ ...clause, params: vec([...items, sym("y")]) }] });
    expect(printNode(widened)).toBe("(fn [x y] (+ x 1))");
    expect(input.map(printNode)).toEqual(["[x]", "(+ x 1)"]);
  });
});

describe("buildFn", () => {
  it("splices a single clause", () => {
    const built = buildFn(parseFn(fnArgs("[x] (+ x 1)")));
    expect(printNode(built)).toBe("(fn [x] (+ x 1))");
  });

  it("wraps each of several clauses", () => {
    const built = buildFn(parseFn(fnArgs("named ([] 0) ([a] 1) ([a b] {:post [(pos? %)]} 2)")));
    expect(printNode(built)).toBe("(fn named ([] 0) ([a] 1) ([a b] {:post [(pos? %)]} 2))");
  });

  it("rebuilds the original arguments after the head", () => {
    const args = fnArgs("([] 0) ([a] (g a))");
    const built = buildFn(parseFn(args));
    expect(nodeEq(built, list([sym("fn"), ...args]))).toBe(true);
  });

  it("uses the configured head symbol", () => {
    const config = mergeConfigs({ forms: { fnHead: "lambda" } });
    expect(printNode(buildFn(parseFn(fnArgs("[x] x")), { config }))).toBe("(lambda [x] x)");
  });

  it("builds from a value constructed directly", () => {
    const value: ParsedFn = {
      name: sym("k"),
      clauses: [{ params: vec([]), prepost: mapping(), body: [] }],
    };
    expect(printNode(buildFn(value))).toBe("(fn k [] {})");
  });
});

describe("parseFn / buildFn idempotence", () => {
  const sources = [
    "[x] (+ x 1)",
    "f [x] {:pre [(pos? x)]} x",
    "([] 0) ([a] 1) ([a b] {:post [(pos? %)]} 2)",
    "g ([x] x) ([x & more] (apply g more))",
    '[s] (str s "!") nil 1.5 true',
  ];

  for (const src of sources) {
    it(`round-trips ${src}`, () => {
      const parsed = parseFn(fnArgs(src));
      const built = buildFn(parsed);
      expect(parseFn(built.items.slice(1))).toEqual(parsed);
    });
  }
});
