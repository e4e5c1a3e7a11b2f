/* =============================================================================
 * Boundary types: host-declared opaque handles whose payload lives in the shim
 * runtime, with a wrap/unwrap function pair and a lazily registered class.
 * ============================================================================= */

export interface BoundaryConfig {
  /** Payload type in shim syntax; the payload travels as a pointer to it. */
  shimType?: string;
  wrapName?: string;
  unwrapName?: string;
  /** Name of the static external-class handle. */
  className?: string;
  /** Shim function releasing the payload. */
  finalizer: string;
  /** Shim function visiting host objects reachable from the payload. */
  foreach: string;
}

export interface BoundaryDeclaration {
  name: string;
  typeParams: readonly string[];
  config: BoundaryConfig;
}

export interface BoundaryNames {
  wrapName: string;
  unwrapName: string;
  className: string;
}

/** What later boundary sites need in order to convert values of a type. */
export interface BoundaryRecord extends BoundaryNames {
  /** Fully-qualified host name. */
  declaredName: string;
  shimType: string;
}

/** Spelling of the shim runtime's external-object API. */
export interface BoundaryRuntime {
  classType: string;
  objectType: string;
  registerClass: string;
  allocExternal: string;
  getExternalData: string;
  nullValue: string;
}

export const DEFAULT_BOUNDARY_RUNTIME: BoundaryRuntime = {
  classType: "inlay_external_class",
  objectType: "inlay_object",
  registerClass: "inlay_register_external_class",
  allocExternal: "inlay_alloc_external",
  getExternalData: "inlay_get_external_data",
  nullValue: "NULL",
};

export const DEFAULT_SHIM_TYPE = "void";
