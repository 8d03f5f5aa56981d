// src/core/syntax/node.ts
// Code-as-data tree: constructors, guards, structural equality, printer

export type OpaqueValue = number | boolean | null;

export type SyntaxNode =
  | { tag: "Symbol"; name: string }
  | { tag: "Keyword"; name: string }
  | { tag: "OrderedSequence"; items: readonly SyntaxNode[] }
  | { tag: "ListForm"; items: readonly SyntaxNode[] }
  | { tag: "Mapping"; entries: readonly MapEntry[] }
  | { tag: "StringLiteral"; value: string }
  | { tag: "Opaque"; value: OpaqueValue };

export type MapEntry = readonly [SyntaxNode, SyntaxNode];

export type SymbolNode = Extract<SyntaxNode, { tag: "Symbol" }>;
export type KeywordNode = Extract<SyntaxNode, { tag: "Keyword" }>;
export type SequenceNode = Extract<SyntaxNode, { tag: "OrderedSequence" }>;
export type ListNode = Extract<SyntaxNode, { tag: "ListForm" }>;
export type MappingNode = Extract<SyntaxNode, { tag: "Mapping" }>;
export type StringNode = Extract<SyntaxNode, { tag: "StringLiteral" }>;
export type OpaqueNode = Extract<SyntaxNode, { tag: "Opaque" }>;

export function sym(name: string): SymbolNode { return { tag: "Symbol", name }; }
export function kw(name: string): KeywordNode { return { tag: "Keyword", name }; }
export function vec(items: readonly SyntaxNode[]): SequenceNode { return { tag: "OrderedSequence", items }; }
export function list(items: readonly SyntaxNode[]): ListNode { return { tag: "ListForm", items }; }
export function str(value: string): StringNode { return { tag: "StringLiteral", value }; }
export function opaque(value: OpaqueValue): OpaqueNode { return { tag: "Opaque", value }; }

/**
 * Build a mapping. Later entries replace earlier ones with an equal key,
 * keeping the position of the first occurrence.
 */
export function mapping(entries: readonly MapEntry[] = []): MappingNode {
  const out: MapEntry[] = [];
  for (const [k, v] of entries) {
    const i = out.findIndex(([existing]) => nodeEq(existing, k));
    if (i >= 0) out[i] = [k, v];
    else out.push([k, v]);
  }
  return { tag: "Mapping", entries: out };
}

export function isSymbol(x: SyntaxNode): x is SymbolNode { return x.tag === "Symbol"; }
export function isKeyword(x: SyntaxNode): x is KeywordNode { return x.tag === "Keyword"; }
export function isOrderedSequence(x: SyntaxNode): x is SequenceNode { return x.tag === "OrderedSequence"; }
export function isListForm(x: SyntaxNode): x is ListNode { return x.tag === "ListForm"; }
export function isMapping(x: SyntaxNode): x is MappingNode { return x.tag === "Mapping"; }
export function isStringLiteral(x: SyntaxNode): x is StringNode { return x.tag === "StringLiteral"; }
export function isOpaque(x: SyntaxNode): x is OpaqueNode { return x.tag === "Opaque"; }

export function mappingGet(m: MappingNode, key: SyntaxNode): SyntaxNode | undefined {
  const hit = m.entries.find(([k]) => nodeEq(k, key));
  return hit?.[1];
}

/** Entries of `over` win on key collision; new keys are appended in order. */
export function mergeMappings(base: MappingNode, over: MappingNode): MappingNode {
  return mapping([...base.entries, ...over.entries]);
}

/** Deep copy; parsed values never share nodes with the tree they came from. */
export function cloneNode(x: SyntaxNode): SyntaxNode {
  switch (x.tag) {
    case "Symbol": return sym(x.name);
    case "Keyword": return kw(x.name);
    case "StringLiteral": return str(x.value);
    case "Opaque": return opaque(x.value);
    case "OrderedSequence": return cloneSequence(x);
    case "ListForm": return list(x.items.map(cloneNode));
    case "Mapping": return cloneMapping(x);
  }
}

export function cloneSequence(x: SequenceNode): SequenceNode {
  return vec(x.items.map(cloneNode));
}

export function cloneMapping(x: MappingNode): MappingNode {
  return { tag: "Mapping", entries: x.entries.map(([k, v]) => [cloneNode(k), cloneNode(v)] as const) };
}

export function nodeEq(a: SyntaxNode, b: SyntaxNode): boolean {
  switch (a.tag) {
    case "Symbol":
      return b.tag === "Symbol" && a.name === b.name;
    case "Keyword":
      return b.tag === "Keyword" && a.name === b.name;
    case "StringLiteral":
      return b.tag === "StringLiteral" && a.value === b.value;
    case "Opaque":
      return b.tag === "Opaque" && Object.is(a.value, b.value);
    case "OrderedSequence":
      return b.tag === "OrderedSequence" && itemsEq(a.items, b.items);
    case "ListForm":
      return b.tag === "ListForm" && itemsEq(a.items, b.items);
    case "Mapping": {
      if (b.tag !== "Mapping" || a.entries.length !== b.entries.length) return false;
      const bm = b;
      // map literals are unordered
      return a.entries.every(([k, v]) => {
        const other = mappingGet(bm, k);
        return other !== undefined && nodeEq(v, other);
      });
    }
  }
}

function itemsEq(aa: readonly SyntaxNode[], bb: readonly SyntaxNode[]): boolean {
  if (aa.length !== bb.length) return false;
  return aa.every((x, i) => {
    const y = bb[i];
    return y !== undefined && nodeEq(x, y);
  });
}

export function printNode(x: SyntaxNode): string {
  switch (x.tag) {
    case "Symbol": return x.name;
    case "Keyword": return `:${x.name}`;
    case "StringLiteral": return JSON.stringify(x.value);
    case "Opaque": return x.value === null ? "nil" : String(x.value);
    case "OrderedSequence": return `[${x.items.map(printNode).join(" ")}]`;
    case "ListForm": return `(${x.items.map(printNode).join(" ")})`;
    case "Mapping":
      return `{${x.entries.map(([k, v]) => `${printNode(k)} ${printNode(v)}`).join(", ")}}`;
  }
}
