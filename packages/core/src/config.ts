/**
 * Tessera configuration
 *
 * Settings resolve once, on first read, from three layers:
 *
 *   defaults  <  config file (cosmiconfig, "tessera")  <  TESSERA_* env vars
 *
 * and `config.set()` patches the resolved result at run time.
 *
 * @example
 * ```typescript
 * config.set({ diagnostics: { verbose: true } });
 * config.flag("diagnostics.verbose", false); // true
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

export interface DiagnosticsConfig {
  /** Print notes such as the size-mismatch note from `Matrix.equals` */
  enabled?: boolean;
  /** Print every MatrixError as it is created */
  verbose?: boolean;
  /** ANSI colors in rendered diagnostics (NO_COLOR wins) */
  colors?: boolean;
}

export interface TesseraConfig {
  diagnostics?: DiagnosticsConfig;
  [key: string]: unknown;
}

type Settings = Record<string, unknown>;

const DEFAULTS: TesseraConfig = {
  diagnostics: { enabled: true, verbose: false, colors: false },
};

const ENV_PREFIX = "TESSERA_";

let resolved: Settings | undefined;

function isSettings(value: unknown): value is Settings {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Right-biased recursive merge; arrays and scalars replace. */
function overlay(base: Settings, patch: Settings): Settings {
  const out: Settings = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = out[key];
    out[key] = isSettings(current) && isSettings(value) ? overlay(current, value) : value;
  }
  return out;
}

function envValue(raw: string): unknown {
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false" || raw === "") return false;
  if (/^\d+$/.test(raw)) return Number(raw);
  return raw;
}

// TESSERA_DIAGNOSTICS_VERBOSE=1 -> { diagnostics: { verbose: true } }
function fromEnv(env: NodeJS.ProcessEnv): Settings {
  let settings: Settings = {};
  for (const [name, raw] of Object.entries(env)) {
    if (raw === undefined || !name.startsWith(ENV_PREFIX)) continue;
    const path = name.slice(ENV_PREFIX.length).toLowerCase().split("_");
    const leaf = path.reduceRight<unknown>((inner, key) => ({ [key]: inner }), envValue(raw));
    if (isSettings(leaf)) settings = overlay(settings, leaf);
  }
  return settings;
}

function fromFile(): Settings {
  const found = cosmiconfigSync("tessera", {
    searchPlaces: [
      "package.json",
      ".tesserarc",
      ".tesserarc.json",
      ".tesserarc.yaml",
      ".tesserarc.yml",
      "tessera.config.cjs",
    ],
  }).search();
  return found && !found.isEmpty && isSettings(found.config) ? found.config : {};
}

function settings(): Settings {
  resolved ??= overlay(overlay({ ...DEFAULTS }, fromFile()), fromEnv(process.env));
  return resolved;
}

export const config = {
  /** Value at a dotted path, or undefined. */
  get(path: string): unknown {
    let node: unknown = settings();
    for (const key of path.split(".")) {
      node = isSettings(node) ? node[key] : undefined;
    }
    return node;
  },

  /** Boolean at a dotted path; `fallback` when absent or not a boolean. */
  flag(path: string, fallback: boolean): boolean {
    const value = config.get(path);
    return typeof value === "boolean" ? value : fallback;
  },

  set(patch: TesseraConfig): void {
    resolved = overlay(settings(), patch);
  },

  /** Drop resolved and patched values; the next read resolves again. */
  reset(): void {
    resolved = undefined;
  },
} as const;
