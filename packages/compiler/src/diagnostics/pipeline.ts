import { debug, NOOP_LOGGER, shimDocumentUri, type Logger } from "@inlay/shared";
import {
  startToolSession,
  toToolError,
  ToolTimeoutError,
  type CollectRequest,
  type CollectResult,
  type StartToolSessionOptions,
  type ToolDefinition,
  type ToolSession,
} from "@inlay/tool-client";
import { readShimOptions } from "../config/options.js";
import type { HostEnvironment } from "../model/environment.js";
import type { HostMessage } from "../model/messages.js";
import { formatPosition, type HostPosition } from "../model/text.js";
import { getShim } from "../synthesis/shim/shim-buffer.js";
import { reportFrom } from "./remap.js";

/** What the pipeline needs from a tool session. */
export interface DiagnosticsCollector {
  collect(request: CollectRequest): Promise<CollectResult>;
}

export interface ShimDiagnosticsDeps {
  /** Returns a ready collector; a rejection is reported as a tool failure. */
  connect(): Promise<DiagnosticsCollector>;
  logger?: Logger;
  /** Base name of the virtual shim document. */
  virtualFile?: string;
}

/**
 * Collect diagnostics for the shim text and report the ones that reach
 * `hostStart` or later to the host. Skipped unless enabled, and when nothing
 * was emitted from `hostStart` on. Never throws for tool trouble: a timeout
 * becomes a host error, any other tool failure a host warning.
 */
export async function reportShimDiagnostics(
  env: HostEnvironment,
  hostStart: HostPosition,
  deps: ShimDiagnosticsDeps,
): Promise<HostMessage[]> {
  const options = readShimOptions(env.options);
  if (!options.diagnostics) return [];

  const shim = getShim(env);
  if (shim.map.hostToShim(hostStart) === undefined) {
    debug.diagnostics("skip.empty", { hostStart: formatPosition(hostStart) });
    return [];
  }

  const logger = deps.logger ?? NOOP_LOGGER;
  const uri = shimDocumentUri(env.fileName, deps.virtualFile);
  let result: CollectResult;
  try {
    const collector = await deps.connect();
    result = await collector.collect({ uri, text: shim.sourceText(), timeoutMs: options.timeoutMs });
  } catch (err) {
    result = { ok: false, error: toToolError(err, "shim diagnostics failed") };
  }

  if (!result.ok) {
    const { error } = result;
    if (error instanceof ToolTimeoutError) {
      report(env, hostStart, "error", `shim diagnostics timed out after ${error.timeoutMs} ms`);
    } else {
      logger.warn(error.message);
      report(env, hostStart, "warning", `shim diagnostics unavailable: ${error.message}`);
    }
    return [];
  }

  const messages = reportFrom(hostStart, result.diagnostics, {
    shim,
    fileName: env.fileName,
    warningAsError: options.warningAsError,
    ...(deps.virtualFile !== undefined ? { virtualFile: deps.virtualFile } : {}),
  });
  debug.diagnostics("report", { received: result.diagnostics.length, reported: messages.length });
  for (const message of messages) env.logMessage(message);
  return messages;
}

function report(env: HostEnvironment, at: HostPosition, severity: "error" | "warning", text: string): void {
  env.logMessage({ fileName: env.fileName, severity, start: at, end: at, text });
}

/**
 * One tool session, started on first use and reused afterwards. A failed
 * start is not retried.
 */
export class LazyToolSession implements DiagnosticsCollector {
  #session: Promise<ToolSession> | null = null;

  constructor(
    private readonly tool?: ToolDefinition,
    private readonly options: StartToolSessionOptions = {},
  ) {}

  get started(): boolean {
    return this.#session !== null;
  }

  async collect(request: CollectRequest): Promise<CollectResult> {
    this.#session ??= startToolSession(this.tool, this.options);
    const session = await this.#session;
    return session.collect(request);
  }

  async dispose(): Promise<void> {
    const pending = this.#session;
    this.#session = null;
    if (!pending) return;
    try {
      const session = await pending;
      await session.dispose();
    } catch (err) {
      (this.options.logger ?? NOOP_LOGGER).warn(toToolError(err, "shim tool shutdown").message);
    }
  }
}
