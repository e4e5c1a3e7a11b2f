import type { DiagnosticRecord } from "./protocol.js";

/** The tool did not report the document idle within the deadline. */
export class ToolTimeoutError extends Error {
  constructor(
    public readonly uri: string,
    public readonly timeoutMs: number,
  ) {
    super(`shim tool did not finish analysing ${uri} within ${timeoutMs} ms`);
    this.name = "ToolTimeoutError";
  }
}

/** The subprocess crashed, exited, or spoke malformed protocol. */
export class ToolError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ToolError";
  }
}

export type CollectResult =
  | { ok: true; diagnostics: readonly DiagnosticRecord[] }
  | { ok: false; error: ToolTimeoutError | ToolError };

export function toToolError(err: unknown, context: string): ToolError {
  if (err instanceof ToolError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ToolError(`${context}: ${detail}`, err);
}
