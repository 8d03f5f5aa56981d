// src/core/reader/read.ts
// Reader: text -> SyntaxNode

import type { Tok } from "./tokenize";
import { ReadError, tokenize } from "./tokenize";
import type { MapEntry, SyntaxNode } from "../syntax/node";
import { kw, list, nodeEq, opaque, printNode, str, sym, vec } from "../syntax/node";
import type { Outcome } from "../../outcome/outcome";
import { done, readError } from "../../outcome/constructors";

const CLOSERS = { "(": ")", "[": "]", "{": "}" } as const;

export function readForms(src: string): SyntaxNode[] {
  const toks = tokenize(src);
  let i = 0;

  function take(): Tok {
    const t = toks[i];
    if (!t) throw new ReadError("unexpected EOF");
    i++;
    return t;
  }

  function readUntil(close: ")" | "]" | "}"): SyntaxNode[] {
    const items: SyntaxNode[] = [];
    while (true) {
      const t = toks[i];
      if (!t) throw new ReadError(`missing '${close}'`);
      if (t.tag === "Close") {
        if (t.delim !== close) throw new ReadError(`expected '${close}', got '${t.delim}'`);
        i++;
        return items;
      }
      items.push(readOne());
    }
  }

  function readOne(): SyntaxNode {
    const t = take();
    switch (t.tag) {
      case "Close":
        throw new ReadError(`unexpected '${t.delim}'`);
      case "Str":
        return str(t.s);
      case "Atom":
        return atomToNode(t.s);
      case "Open": {
        const items = readUntil(CLOSERS[t.delim]);
        if (t.delim === "(") return list(items);
        if (t.delim === "[") return vec(items);
        return { tag: "Mapping", entries: pairUp(items) };
      }
    }
  }

  const out: SyntaxNode[] = [];
  while (i < toks.length) out.push(readOne());
  return out;
}

export function readForm(src: string): SyntaxNode {
  const forms = readForms(src);
  const [first] = forms;
  if (!first) throw new ReadError("unexpected EOF");
  if (forms.length > 1) throw new ReadError("trailing forms after first expression");
  return first;
}

export function tryReadForm(src: string): Outcome<SyntaxNode> {
  try {
    return done(readForm(src));
  } catch (e) {
    if (!(e instanceof ReadError)) throw e;
    return readError(e.message);
  }
}

function pairUp(items: SyntaxNode[]): MapEntry[] {
  if (items.length % 2 !== 0) throw new ReadError("map literal must contain an even number of forms");
  const entries: MapEntry[] = [];
  for (let j = 0; j < items.length; j += 2) {
    const k = items[j];
    const v = items[j + 1];
    if (k === undefined || v === undefined) break;
    if (entries.some(([existing]) => nodeEq(existing, k))) {
      throw new ReadError(`duplicate key: ${printNode(k)}`);
    }
    entries.push([k, v]);
  }
  return entries;
}

function atomToNode(a: string): SyntaxNode {
  if (a === "nil") return opaque(null);
  if (a === "true") return opaque(true);
  if (a === "false") return opaque(false);
  if (/^-?\d+(\.\d+)?$/.test(a)) return opaque(Number(a));
  if (a.startsWith(":") && a.length > 1) return kw(a.slice(1));
  return sym(a);
}
