/**
 * Wire-level names and payloads exchanged with the shim tool.
 */
import type { Diagnostic, DiagnosticSeverity, Range } from "vscode-languageserver/node.js";

export const Methods = {
  initialize: "initialize",
  initialized: "initialized",
  shutdown: "shutdown",
  exit: "exit",
  didOpen: "textDocument/didOpen",
  didClose: "textDocument/didClose",
  publishDiagnostics: "textDocument/publishDiagnostics",
} as const;

/** A diagnostic as reported by the tool, still in shim-text coordinates. */
export interface DiagnosticRecord {
  readonly range: Range;
  readonly severity: DiagnosticSeverity | undefined;
  readonly message: string;
  readonly code?: string | number;
  readonly source?: string;
}

/** Payload of the tool-specific "file status" notification. */
export interface FileStatusParams {
  uri: string;
  state: string;
}

export function isFileStatusParams(value: unknown): value is FileStatusParams {
  if (typeof value !== "object" || value === null) return false;
  return "uri" in value && typeof value.uri === "string" && "state" in value && typeof value.state === "string";
}

export function isPublishDiagnosticsParams(
  value: unknown,
): value is { uri: string; diagnostics: Diagnostic[] } {
  if (typeof value !== "object" || value === null) return false;
  return "uri" in value && typeof value.uri === "string" && "diagnostics" in value && Array.isArray(value.diagnostics);
}

export function toDiagnosticRecord(diag: Diagnostic): DiagnosticRecord {
  return {
    range: diag.range,
    severity: diag.severity,
    message: diag.message,
    ...(diag.code !== undefined ? { code: diag.code } : {}),
    ...(diag.source !== undefined ? { source: diag.source } : {}),
  };
}
