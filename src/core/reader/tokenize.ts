// src/core/reader/tokenize.ts
// Tokenizer for the bracketed code-as-data surface syntax

export type Tok =
  | { tag: "Open"; delim: "(" | "[" | "{" }
  | { tag: "Close"; delim: ")" | "]" | "}" }
  | { tag: "Str"; s: string }
  | { tag: "Atom"; s: string };

export class ReadError extends Error {
  constructor(message: string) {
    super(`read: ${message}`);
    this.name = "ReadError";
  }
}

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\"": "\"", "\\": "\\" };

// commas read as whitespace
const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === ",";
const isDelim = (c: string) => "()[]{}\";".includes(c);

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src.charAt(i);

    if (c === ";") {
      while (i < src.length && src.charAt(i) !== "\n") i++;
      continue;
    }

    if (isWS(c)) { i++; continue; }

    if (c === "(" || c === "[" || c === "{") { toks.push({ tag: "Open", delim: c }); i++; continue; }
    if (c === ")" || c === "]" || c === "}") { toks.push({ tag: "Close", delim: c }); i++; continue; }

    if (c === "\"") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          if (i + 1 >= src.length) throw new ReadError("unterminated escape");
          const e = src.charAt(i + 1);
          s += ESCAPES[e] ?? e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new ReadError("unterminated string");
      toks.push({ tag: "Str", s });
      continue;
    }

    let a = "";
    while (i < src.length) {
      const d = src.charAt(i);
      if (isWS(d) || isDelim(d)) break;
      a += d;
      i++;
    }
    toks.push({ tag: "Atom", s: a });
  }

  return toks;
}
