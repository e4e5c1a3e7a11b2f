import { debug } from "@inlay/shared";
import { EnvExtension, type HostEnvironment } from "../../model/environment.js";
import { InlayError, InlayErrorCode } from "../../shared/errors.js";
import type { TranslateContext } from "../shim/registry.js";
import { getShim, setShim } from "../shim/shim-buffer.js";
import { isShimIdentifier, mangleName } from "./mangle.js";
import {
  DEFAULT_BOUNDARY_RUNTIME,
  DEFAULT_SHIM_TYPE,
  type BoundaryConfig,
  type BoundaryDeclaration,
  type BoundaryNames,
  type BoundaryRecord,
  type BoundaryRuntime,
} from "./types.js";

/** Boundary records of the compilation unit, keyed by fully-qualified name. */
export const boundaryExtension = new EnvExtension<ReadonlyMap<string, BoundaryRecord>>(
  "inlay.boundary",
  () => new Map(),
);

export function lookupBoundary(env: HostEnvironment, declaredName: string): BoundaryRecord | undefined {
  return boundaryExtension.get(env).get(declaredName);
}

/** Names from `config`, or derived from the mangled declared name. */
export function boundaryNames(declaredName: string, config: Pick<BoundaryConfig, "wrapName" | "unwrapName" | "className">): BoundaryNames {
  const mangled = mangleName(declaredName);
  return {
    wrapName: config.wrapName ?? `_inlay_wrap_${mangled}`,
    unwrapName: config.unwrapName ?? `_inlay_unwrap_${mangled}`,
    className: config.className ?? `_inlay_class_${mangled}`,
  };
}

/**
 * Shim commands for one boundary type: the class handle, the wrap function
 * with its run-once registration guard, and the unwrap function.
 */
export function renderBoundary(
  names: BoundaryNames,
  config: BoundaryConfig,
  runtime: BoundaryRuntime = DEFAULT_BOUNDARY_RUNTIME,
): string[] {
  const payload = `${config.shimType ?? DEFAULT_SHIM_TYPE} *`;
  const handle = `static ${runtime.classType} * ${names.className} = ${runtime.nullValue};`;
  const wrap = [
    `static inline ${runtime.objectType} * ${names.wrapName}(${payload}o) {`,
    `  if (${names.className} == ${runtime.nullValue}) {`,
    `    ${names.className} = ${runtime.registerClass}(${config.finalizer}, ${config.foreach});`,
    `  }`,
    `  return ${runtime.allocExternal}(${names.className}, o);`,
    `}`,
  ].join("\n");
  const unwrap = [
    `static inline ${payload}${names.unwrapName}(${runtime.objectType} * o) {`,
    `  return (${payload})(${runtime.getExternalData}(o));`,
    `}`,
  ].join("\n");
  return [handle, wrap, unwrap];
}

export function validateBoundaryConfig(config: BoundaryConfig): void {
  const checks: [string, string | undefined][] = [
    ["finalize", config.finalizer],
    ["foreach", config.foreach],
    ["wrap", config.wrapName],
    ["unwrap", config.unwrapName],
    ["class", config.className],
  ];
  for (const [field, value] of checks) {
    if (value === undefined) continue;
    if (!isShimIdentifier(value)) {
      throw new InlayError(
        `boundary field '${field}' must be a shim identifier, got '${value}'`,
        InlayErrorCode.INVALID_BOUNDARY_CONFIG,
      );
    }
  }
  if (config.shimType !== undefined && config.shimType.trim().length === 0) {
    throw new InlayError("boundary shim type must not be empty", InlayErrorCode.INVALID_BOUNDARY_CONFIG);
  }
}

/**
 * Declare `decl.name` as an opaque host type and emit its boundary code.
 * Nothing reaches the shim unless the name resolves to exactly one
 * declaration; the three commands are appended together or not at all.
 */
export function generateBoundary(
  decl: BoundaryDeclaration,
  ctx: TranslateContext,
  runtime: BoundaryRuntime = DEFAULT_BOUNDARY_RUNTIME,
): BoundaryRecord {
  const { env, origin } = ctx;
  validateBoundaryConfig(decl.config);

  env.declareOpaqueType(decl.name, decl.typeParams);
  const candidates = env.resolveGlobalName(decl.name);
  const [declaredName] = candidates;
  if (candidates.length !== 1 || declaredName === undefined) {
    const detail = candidates.length === 0 ? "unknown" : `ambiguous (${candidates.join(", ")})`;
    throw new InlayError(`boundary type '${decl.name}' is ${detail}`, InlayErrorCode.NAME_RESOLUTION, {
      position: origin,
    });
  }
  if (lookupBoundary(env, declaredName)) {
    throw new InlayError(`boundary code for '${declaredName}' was already generated`, InlayErrorCode.DUPLICATE_BOUNDARY, {
      position: origin,
    });
  }

  const names = boundaryNames(declaredName, decl.config);
  const shimType = (decl.config.shimType ?? DEFAULT_SHIM_TYPE).trim();
  let shim = getShim(env);
  for (const command of renderBoundary(names, { ...decl.config, shimType }, runtime)) {
    shim = shim.pushCommand(command, origin);
  }
  setShim(env, shim);

  const record: BoundaryRecord = { declaredName, shimType, ...names };
  boundaryExtension.modify(env, (table) => new Map(table).set(declaredName, record));
  debug.boundary("generated", { declaredName, wrap: names.wrapName, unwrap: names.unwrapName });
  return record;
}
