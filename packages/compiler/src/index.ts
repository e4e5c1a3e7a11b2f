// Compiler package public API
//
// This barrel exports the shim synthesis, boundary generation and diagnostics
// APIs. Import from here rather than deep paths for stability.

// === Model ===
export * from "./model/index.js";

// === Errors ===
export { InlayError, InlayErrorCode, isInlayError } from "./shared/errors.js";
export type { InlayErrorCodeType, InlayErrorDetails } from "./shared/errors.js";

// === Options ===
export {
  DEFAULT_SHIM_OPTIONS,
  SHIM_OPTION_DESCRIPTORS,
  readShimOptions,
  recordOptionSource,
} from "./config/options.js";
export type { AnyOptionDescriptor, OptionDescriptor, ShimOptions } from "./config/options.js";

// === Shim buffer ===
export { PositionMap } from "./synthesis/shim/position-map.js";
export type { PositionMapEntry } from "./synthesis/shim/position-map.js";
export {
  ShimBuffer,
  shimExtension,
  getShim,
  setShim,
  modifyShim,
  pushShimCommand,
} from "./synthesis/shim/shim-buffer.js";
export type { ShimCommand } from "./synthesis/shim/shim-buffer.js";

// === Translation ===
export { TranslatorRegistry } from "./synthesis/shim/registry.js";
export type { CommandTranslator, InlineTranslator, TranslateContext } from "./synthesis/shim/registry.js";
export { reprint } from "./synthesis/shim/reprint.js";
export { elaborate, elaborateCommands, originOf, reportCommandError } from "./synthesis/shim/translator.js";
export { createDefaultRegistry, SECTION_KIND, TO_HOST_KIND, OF_HOST_KIND } from "./synthesis/builtins.js";
export type { DefaultRegistryOptions } from "./synthesis/builtins.js";

// === Boundary types ===
export { DEFAULT_BOUNDARY_RUNTIME, DEFAULT_SHIM_TYPE } from "./synthesis/boundary/types.js";
export type {
  BoundaryConfig,
  BoundaryDeclaration,
  BoundaryNames,
  BoundaryRecord,
  BoundaryRuntime,
} from "./synthesis/boundary/types.js";
export { mangleName, isShimIdentifier } from "./synthesis/boundary/mangle.js";
export {
  boundaryExtension,
  boundaryNames,
  generateBoundary,
  lookupBoundary,
  renderBoundary,
  validateBoundaryConfig,
} from "./synthesis/boundary/generator.js";
export {
  BOUNDARY_KIND,
  BOUNDARY_CONFIG_KIND,
  BOUNDARY_FIELD_KIND,
  parseBoundaryDeclaration,
} from "./synthesis/boundary/declaration.js";

// === Diagnostics ===
export { classifySeverity, cleanMessage, reportFrom } from "./diagnostics/remap.js";
export type { RemapOptions } from "./diagnostics/remap.js";
export { reportShimDiagnostics, LazyToolSession } from "./diagnostics/pipeline.js";
export type { DiagnosticsCollector, ShimDiagnosticsDeps } from "./diagnostics/pipeline.js";

// === Elaboration ===
export { elaborateSection } from "./elaboration/section.js";
export type { SectionDeps, SectionResult } from "./elaboration/section.js";
