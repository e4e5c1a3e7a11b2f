/* =============================================================================
 * Shim Options
 * =============================================================================
 * Options read from the host environment. Two are registered by this package;
 * `warningAsError` belongs to the host and is only read here.
 * ============================================================================= */

import type { OptionSource } from "../model/environment.js";

export interface ShimOptions {
  /** Collect shim tool diagnostics after each section. */
  diagnostics: boolean;
  /** How long to wait for the tool to go idle, in milliseconds. */
  timeoutMs: number;
  warningAsError: boolean;
}

export const DEFAULT_SHIM_OPTIONS: Readonly<ShimOptions> = {
  diagnostics: false,
  timeoutMs: 1000,
  warningAsError: false,
};

export interface OptionDescriptor<K extends keyof ShimOptions> {
  name: string;
  field: K;
  type: "boolean" | "number";
  description: string;
}

export type AnyOptionDescriptor = { [K in keyof ShimOptions]: OptionDescriptor<K> }[keyof ShimOptions];

export const SHIM_OPTION_DESCRIPTORS: readonly AnyOptionDescriptor[] = [
  {
    name: "inlay.shimDiagnostics",
    field: "diagnostics",
    type: "boolean",
    description: "Report diagnostics from the shim analysis tool as host messages.",
  },
  {
    name: "inlay.shimDiagnostics.timeout",
    field: "timeoutMs",
    type: "number",
    description: "Milliseconds to wait for the shim analysis tool to finish.",
  },
  {
    name: "warningAsError",
    field: "warningAsError",
    type: "boolean",
    description: "Treat warnings as errors (host option).",
  },
];

/**
 * Resolve options from `source`. A value of the wrong type falls back to its
 * default; a timeout that is not a positive finite number does too.
 */
export function readShimOptions(source: OptionSource): ShimOptions {
  const options: ShimOptions = { ...DEFAULT_SHIM_OPTIONS };
  for (const descriptor of SHIM_OPTION_DESCRIPTORS) {
    const raw = source.get(descriptor.name);
    switch (descriptor.field) {
      case "diagnostics":
      case "warningAsError":
        if (typeof raw === "boolean") options[descriptor.field] = raw;
        break;
      case "timeoutMs":
        if (typeof raw === "number" && Number.isFinite(raw) && raw > 0) options.timeoutMs = raw;
        break;
    }
  }
  return options;
}

/** Option source over a plain record, for hosts that keep options as data. */
export function recordOptionSource(values: Readonly<Record<string, unknown>>): OptionSource {
  return {
    get: (key) => (Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined),
  };
}
