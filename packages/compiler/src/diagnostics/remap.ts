/**
 * Shim tool diagnostics → host messages.
 */
import { DiagnosticSeverity } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { debug, SHIM_VIRTUAL_FILE } from "@inlay/shared";
import type { DiagnosticRecord } from "@inlay/tool-client";
import type { HostMessage, MessageSeverity } from "../model/messages.js";
import { comparePositions, formatPosition, type HostPosition } from "../model/text.js";
import type { ShimBuffer } from "../synthesis/shim/shim-buffer.js";

const FIX_AVAILABLE = " (fix available)";

export interface RemapOptions {
  shim: ShimBuffer;
  fileName: string;
  warningAsError: boolean;
  /** Name the tool prints for the shim document in related notes. */
  virtualFile?: string;
}

export function classifySeverity(
  severity: DiagnosticSeverity | undefined,
  warningAsError: boolean,
): MessageSeverity {
  switch (severity) {
    case DiagnosticSeverity.Error:
      return "error";
    case DiagnosticSeverity.Warning:
      return warningAsError ? "error" : "warning";
    default:
      return "information";
  }
}

/**
 * Drop the tool's notes about the virtual document, strip the
 * "(fix available)" suffix, and collapse what is left.
 */
export function cleanMessage(text: string, virtualFile: string = SHIM_VIRTUAL_FILE): string {
  const marker = `${virtualFile}:`;
  const lines: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    let line = raw.trim();
    if (line.startsWith(marker)) continue;
    if (line.endsWith(FIX_AVAILABLE)) line = line.slice(0, -FIX_AVAILABLE.length).trimEnd();
    if (line.length > 0) lines.push(line);
  }
  return lines.join("\n").trim();
}

/**
 * Host messages for the records that reach `hostStart` or later. Ranges are
 * converted to shim offsets against the buffer's text, then mapped through
 * its position map.
 */
export function reportFrom(
  hostStart: HostPosition,
  records: readonly DiagnosticRecord[],
  options: RemapOptions,
): HostMessage[] {
  const { shim, fileName, warningAsError } = options;
  const doc = TextDocument.create("inlay-shim:buffer", "c", 0, shim.sourceText());
  const messages: HostMessage[] = [];

  for (const record of records) {
    const startOffset = doc.offsetAt(record.range.start);
    const endOffset = doc.offsetAt(record.range.end);
    const start = shim.map.shimToHost(startOffset);
    const end = shim.map.shimEndToHost(startOffset, endOffset);
    if (comparePositions(end, hostStart) < 0) {
      debug.diagnostics("drop.stale", { end: formatPosition(end), hostStart: formatPosition(hostStart) });
      continue;
    }
    const text = cleanMessage(record.message, options.virtualFile);
    if (text.length === 0) {
      debug.diagnostics("drop.empty", { message: record.message });
      continue;
    }
    messages.push({ fileName, severity: classifySeverity(record.severity, warningAsError), start, end, text });
  }
  return messages;
}
