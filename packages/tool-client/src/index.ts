export { OneShotSignal } from "./signal.js";
export {
  Methods,
  isFileStatusParams,
  isPublishDiagnosticsParams,
  toDiagnosticRecord,
  type DiagnosticRecord,
  type FileStatusParams,
} from "./protocol.js";
export { CLANGD_TOOL, resolveTool, withCommandOverride, type ToolDefinition } from "./tools.js";
export { ToolError, ToolTimeoutError, toToolError, type CollectResult } from "./errors.js";
export {
  ToolSession,
  startToolSession,
  type CollectRequest,
  type StartToolSessionOptions,
  type ToolSessionOptions,
} from "./session.js";
