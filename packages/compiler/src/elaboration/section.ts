import { debug } from "@inlay/shared";
import { reportShimDiagnostics, type ShimDiagnosticsDeps } from "../diagnostics/pipeline.js";
import type { HostEnvironment } from "../model/environment.js";
import type { HostMessage } from "../model/messages.js";
import { syntaxStart, type HostSyntax } from "../model/syntax.js";
import { formatPosition, NO_POSITION, type HostPosition } from "../model/text.js";
import type { TranslatorRegistry } from "../synthesis/shim/registry.js";
import { getShim } from "../synthesis/shim/shim-buffer.js";
import { elaborateCommands } from "../synthesis/shim/translator.js";

export interface SectionDeps extends ShimDiagnosticsDeps {
  registry: TranslatorRegistry;
}

export interface SectionResult {
  /** Host position of the section's first command. */
  hostStart: HostPosition;
  /** Commands that reported an error and contributed nothing. */
  failures: number;
  /** Shim commands appended by this section. */
  emitted: number;
  diagnostics: HostMessage[];
}

/**
 * Elaborate one host section of shim commands, then report shim tool
 * diagnostics for what the section appended.
 */
export async function elaborateSection(
  env: HostEnvironment,
  commands: readonly HostSyntax[],
  deps: SectionDeps,
): Promise<SectionResult> {
  const hostStart = sectionStart(env, commands);
  const before = getShim(env).commands.length;
  const failures = elaborateCommands(commands, { env, registry: deps.registry, origin: hostStart });
  const emitted = getShim(env).commands.length - before;
  debug.shim("section", { hostStart: formatPosition(hostStart), commands: commands.length, emitted, failures });

  const diagnostics = await reportShimDiagnostics(env, hostStart, deps);
  return { hostStart, failures, emitted, diagnostics };
}

function sectionStart(env: HostEnvironment, commands: readonly HostSyntax[]): HostPosition {
  for (const command of commands) {
    const start = syntaxStart(command);
    if (start !== null) return env.positionAt(start);
  }
  return NO_POSITION;
}
