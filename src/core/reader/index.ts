// src/core/reader/index.ts
// Reader exports

export { type Tok, ReadError, tokenize } from "./tokenize";
export { readForm, readForms, tryReadForm } from "./read";
