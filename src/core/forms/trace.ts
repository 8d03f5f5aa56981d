// src/core/forms/trace.ts

import { DEFAULT_CONFIG } from "../config/config";
import type { FormOptions } from "./types";

export type TraceLog = (msg: string, data?: unknown) => void;

const silent: TraceLog = () => {};

/** Explicit logger first; otherwise console.log when tracing is switched on. */
export function resolveTrace(opts?: FormOptions): TraceLog {
  if (opts?.log) return opts.log;
  const config = opts?.config ?? DEFAULT_CONFIG;
  return config.trace.enabled ? console.log : silent;
}
