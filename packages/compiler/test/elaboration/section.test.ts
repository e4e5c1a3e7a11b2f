import { afterEach, describe, expect, test, vi } from "vitest";
import { DiagnosticSeverity } from "vscode-languageserver/node.js";
import {
  CLANGD_TOOL,
  ToolError,
  ToolSession,
  ToolTimeoutError,
  type CollectRequest,
  type CollectResult,
  type DiagnosticRecord,
} from "@inlay/tool-client";
import type { Logger } from "@inlay/shared";
import {
  createDefaultRegistry,
  elaborateSection,
  getShim,
  reportShimDiagnostics,
  type DiagnosticsCollector,
} from "@inlay/compiler";
import { commandAt, createTestHost, type TestHost } from "../_helpers/host-env.js";
import { createInProcessTool, type InProcessTool } from "../_helpers/shim-tool.js";

const SHIM_URI = "file:///work/src/nul";
const ENABLED = { "inlay.shimDiagnostics": true };

function warningOnLine(line: number, message: string): DiagnosticRecord {
  return {
    range: { start: { line, character: 0 }, end: { line, character: 5 } },
    severity: DiagnosticSeverity.Warning,
    message,
  };
}

function stubCollector(result: CollectResult): DiagnosticsCollector & { requests: CollectRequest[] } {
  const requests: CollectRequest[] = [];
  return {
    requests,
    collect: async (request) => {
      requests.push(request);
      return result;
    },
  };
}

function threeCommands(host: TestHost) {
  return [commandAt(host, 10, "int a;"), commandAt(host, 25, "int b;"), commandAt(host, 40, "int c;")];
}

function deps(collector: DiagnosticsCollector, logger?: Logger) {
  const connect = vi.fn(async () => collector);
  return { registry: createDefaultRegistry(), connect, ...(logger ? { logger } : {}) };
}

describe("elaborateSection", () => {
  test("elaborates without touching the tool when diagnostics are off", async () => {
    const host = createTestHost();
    const d = deps(stubCollector({ ok: true, diagnostics: [] }));

    const result = await elaborateSection(host, threeCommands(host), d);

    expect(result).toEqual({ hostStart: { line: 10, column: 0 }, failures: 0, emitted: 3, diagnostics: [] });
    expect(getShim(host).sourceText()).toBe("int a;\nint b;\nint c;\n");
    expect(d.connect).not.toHaveBeenCalled();
  });

  test("reports a tool warning at the host position of the command it points into", async () => {
    const host = createTestHost({ options: ENABLED });
    const collector = stubCollector({ ok: true, diagnostics: [warningOnLine(1, "unused variable 'b' (fix available)")] });

    const result = await elaborateSection(host, threeCommands(host), deps(collector));

    const expected = {
      fileName: host.fileName,
      severity: "warning",
      start: { line: 25, column: 0 },
      end: { line: 25, column: 0 },
      text: "unused variable 'b'",
    };
    expect(result.diagnostics).toEqual([expected]);
    expect(host.messages).toEqual([expected]);
    expect(collector.requests).toEqual([{ uri: SHIM_URI, text: "int a;\nint b;\nint c;\n", timeoutMs: 1000 }]);
  });

  test("only reports what the latest section reaches", async () => {
    const host = createTestHost({ options: ENABLED });
    const collector = stubCollector({
      ok: true,
      diagnostics: [warningOnLine(0, "from the first section"), warningOnLine(1, "from the second section")],
    });
    const d = deps(collector);

    await elaborateSection(host, [commandAt(host, 10, "int a;")], d);
    host.messages.length = 0;
    const second = await elaborateSection(host, [commandAt(host, 25, "int b;")], d);

    expect(second.diagnostics.map((m) => m.text)).toEqual(["from the second section"]);
    expect(host.messages.map((m) => m.text)).toEqual(["from the second section"]);
  });

  test("counts failed commands and still collects for the rest", async () => {
    const host = createTestHost({ options: ENABLED });
    const collector = stubCollector({ ok: true, diagnostics: [] });
    const commands = [commandAt(host, 10, "int a\u0001;"), commandAt(host, 12, "int b;")];

    const result = await elaborateSection(host, commands, deps(collector));

    expect(result.failures).toBe(1);
    expect(result.emitted).toBe(1);
    expect(collector.requests).toHaveLength(1);
  });
});

describe("reportShimDiagnostics", () => {
  test("skips the tool when nothing was emitted from the host start on", async () => {
    const host = createTestHost({ options: ENABLED });
    await elaborateSection(host, [commandAt(host, 10, "int a;")], deps(stubCollector({ ok: true, diagnostics: [] })));
    const d = deps(stubCollector({ ok: true, diagnostics: [] }));

    const messages = await reportShimDiagnostics(host, { line: 30, column: 0 }, d);

    expect(messages).toEqual([]);
    expect(d.connect).not.toHaveBeenCalled();
  });

  test("passes the configured timeout and reports running out of it as an error", async () => {
    const host = createTestHost({ options: { ...ENABLED, "inlay.shimDiagnostics.timeout": 250 } });
    const collector = stubCollector({ ok: false, error: new ToolTimeoutError(SHIM_URI, 250) });

    const result = await elaborateSection(host, threeCommands(host), deps(collector));

    expect(result.diagnostics).toEqual([]);
    expect(collector.requests[0]?.timeoutMs).toBe(250);
    expect(host.messages).toEqual([
      {
        fileName: host.fileName,
        severity: "error",
        start: { line: 10, column: 0 },
        end: { line: 10, column: 0 },
        text: "shim diagnostics timed out after 250 ms",
      },
    ]);
  });

  test("downgrades tool failures to a warning", async () => {
    const host = createTestHost({ options: ENABLED });
    const warn = vi.fn();
    const logger: Logger = { log: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const collector = stubCollector({ ok: false, error: new ToolError("tool crashed") });

    await elaborateSection(host, threeCommands(host), deps(collector, logger));

    expect(host.messages.map((m) => [m.severity, m.text])).toEqual([["warning", "shim diagnostics unavailable: tool crashed"]]);
    expect(warn).toHaveBeenCalledWith("tool crashed");
  });

  test("downgrades a failure to start the tool to a warning", async () => {
    const host = createTestHost({ options: ENABLED });

    await elaborateSection(host, threeCommands(host), {
      registry: createDefaultRegistry(),
      connect: async () => {
        throw new Error("spawn clangd ENOENT");
      },
    });

    expect(host.messages.map((m) => [m.severity, m.text])).toEqual([
      ["warning", "shim diagnostics unavailable: shim diagnostics failed: spawn clangd ENOENT"],
    ]);
  });
});

describe("with a tool session", () => {
  let tool: InProcessTool;
  let session: ToolSession;

  afterEach(async () => {
    await session.dispose();
    tool.server.dispose();
  });

  test("opens the shim beside the host file and releases it afterwards", async () => {
    tool = createInProcessTool();
    tool.diagnostics = [warningOnLine(2, "comparison of distinct pointer types")];
    session = new ToolSession(tool.client, { tool: CLANGD_TOOL });
    const host = createTestHost({ options: ENABLED });

    const result = await elaborateSection(host, threeCommands(host), {
      registry: createDefaultRegistry(),
      connect: async () => session,
    });

    expect(result.diagnostics.map((m) => [m.severity, m.start, m.text])).toEqual([
      ["warning", { line: 40, column: 0 }, "comparison of distinct pointer types"],
    ]);
    expect(tool.opened).toEqual([{ uri: SHIM_URI, languageId: "c", text: "int a;\nint b;\nint c;\n" }]);
    await vi.waitFor(() => expect(tool.closed).toEqual([SHIM_URI]));
    expect(session.handlerCount).toBe(0);
    expect(session.openDocuments.size).toBe(0);
  });
});
