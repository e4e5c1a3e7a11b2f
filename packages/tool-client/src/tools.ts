/**
 * Shim tool definitions.
 */

export interface ToolDefinition {
  /** Unique identifier, used in log lines. */
  id: string;
  /** Command and arguments to spawn the tool in stdio mode. */
  command: readonly string[];
  /** Language id sent with `textDocument/didOpen`. */
  languageId: string;
  /** Notification the tool sends while (re)analysing a document. */
  fileStatusMethod: string;
  /** `state` value of that notification once analysis has finished. */
  idleState: string;
  /** Sent verbatim as `initializationOptions`. */
  initializationOptions?: Record<string, unknown>;
  env?: Record<string, string>;
}

export const CLANGD_TOOL: ToolDefinition = {
  id: "clangd",
  command: ["clangd", "--log=error"],
  languageId: "c",
  fileStatusMethod: "textDocument/clangd.fileStatus",
  idleState: "idle",
  initializationOptions: { clangdFileStatus: true },
};

/**
 * Apply a whitespace-separated command override (e.g. `INLAY_SHIM_TOOL`).
 * Blank overrides leave the definition untouched.
 */
export function withCommandOverride(tool: ToolDefinition, override: string | undefined): ToolDefinition {
  const parts = (override ?? "").split(/\s+/).filter((p) => p.length > 0);
  if (parts.length === 0) return tool;
  return { ...tool, command: parts };
}

export function resolveTool(tool: ToolDefinition = CLANGD_TOOL, env: NodeJS.ProcessEnv = process.env): ToolDefinition {
  return withCommandOverride(tool, env["INLAY_SHIM_TOOL"]);
}
