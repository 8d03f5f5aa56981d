// src/core/config/config.ts
// Configuration for the function-form parsers and builders

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type FormHeadsConfig = {
  /** Head symbol of a function literal, e.g. (fn [x] x) */
  fnHead: string;
  /** Head symbol of a named definition, e.g. (defn f [x] x) */
  defnHead: string;
  /** Metadata keyword seeded from a docstring */
  docKey: string;
};

export type TraceConfig = {
  /** Log parse decisions through console.log when no logger is supplied */
  enabled: boolean;
};

export type FormsConfig = {
  forms: FormHeadsConfig;
  trace: TraceConfig;
};

export type PartialFormsConfig = {
  forms?: Partial<FormHeadsConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_FORM_HEADS: FormHeadsConfig = {
  fnHead: "fn",
  defnHead: "defn",
  docKey: "doc",
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  enabled: false,
};

export const DEFAULT_CONFIG: FormsConfig = {
  forms: DEFAULT_FORM_HEADS,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["fn-forms.config.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return raw === "1" || raw.toLowerCase() === "true";
}

/**
 * Load configuration from environment variables.
 * Unset variables fall back to the defaults.
 */
export function configFromEnv(prefix = "FNFORMS"): FormsConfig {
  const env = process.env;
  return {
    forms: {
      fnHead: env[`${prefix}_FN_HEAD`] || DEFAULT_FORM_HEADS.fnHead,
      defnHead: env[`${prefix}_DEFN_HEAD`] || DEFAULT_FORM_HEADS.defnHead,
      docKey: env[`${prefix}_DOC_KEY`] || DEFAULT_FORM_HEADS.docKey,
    },
    trace: {
      enabled: parseFlag(env[`${prefix}_TRACE`]) ?? DEFAULT_TRACE_CONFIG.enabled,
    },
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pickString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = data[k];
    if (typeof v === "string" && v !== "") return v;
  }
  return undefined;
}

function pickBool(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const k of keys) {
    const v = data[k];
    if (typeof v === "boolean") return v;
  }
  return undefined;
}

/**
 * Create a partial configuration from a plain object (e.g. parsed JSON).
 * Accepts camelCase and snake_case keys; unknown or ill-typed fields are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialFormsConfig {
  const formsData = isRecord(data.forms) ? data.forms : {};
  const traceData = isRecord(data.trace) ? data.trace : {};

  const forms: Partial<FormHeadsConfig> = {};
  const fnHead = pickString(formsData, "fnHead", "fn_head");
  const defnHead = pickString(formsData, "defnHead", "defn_head");
  const docKey = pickString(formsData, "docKey", "doc_key");
  if (fnHead !== undefined) forms.fnHead = fnHead;
  if (defnHead !== undefined) forms.defnHead = defnHead;
  if (docKey !== undefined) forms.docKey = docKey;

  const trace: Partial<TraceConfig> = {};
  const enabled = pickBool(traceData, "enabled");
  if (enabled !== undefined) trace.enabled = enabled;

  return { forms, trace };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialFormsConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialFormsConfig[]): FormsConfig {
  let result: FormsConfig = { forms: { ...DEFAULT_CONFIG.forms }, trace: { ...DEFAULT_CONFIG.trace } };

  for (const cfg of configs) {
    result = {
      forms: { ...result.forms, ...cfg.forms },
      trace: { ...result.trace, ...cfg.trace },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialFormsConfig;
}): FormsConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

const RESERVED_ATOMS = new Set(["nil", "true", "false"]);

function symbolProblem(name: string): string | undefined {
  if (name.length === 0) return "must not be empty";
  if (/[\s,()[\]{}";]/.test(name)) return "must not contain whitespace or delimiters";
  if (name.startsWith(":")) return "must not start with ':'";
  if (/^-?\d/.test(name)) return "must not start with a digit";
  if (RESERVED_ATOMS.has(name)) return "must not be a reserved literal";
  return undefined;
}

export function validateConfig(config: FormsConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const fields = [
    ["forms.fnHead", config.forms.fnHead],
    ["forms.defnHead", config.forms.defnHead],
    ["forms.docKey", config.forms.docKey],
  ] as const;
  for (const [field, value] of fields) {
    const problem = symbolProblem(value);
    if (problem) errors.push(`${field} ${problem}`);
  }

  if (config.forms.fnHead === config.forms.defnHead) {
    errors.push("forms.fnHead and forms.defnHead must differ");
  }
  if (config.forms.docKey !== DEFAULT_FORM_HEADS.docKey) {
    warnings.push(`docstrings will be stored under :${config.forms.docKey} instead of :doc`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
