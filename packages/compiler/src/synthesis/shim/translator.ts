import { debug } from "@inlay/shared";
import { snapshotEnv, type HostEnvironment } from "../../model/environment.js";
import { syntaxEnd, syntaxKind, syntaxStart, type HostSyntax } from "../../model/syntax.js";
import { formatPosition, type HostPosition } from "../../model/text.js";
import { InlayError, InlayErrorCode, isInlayError } from "../../shared/errors.js";
import type { TranslateContext } from "./registry.js";
import { reprint } from "./reprint.js";
import { pushShimCommand } from "./shim-buffer.js";

const MAX_EXPANSION_DEPTH = 256;

/** Host position of `syntax`, falling back to the enclosing command's origin. */
export function originOf(syntax: HostSyntax, ctx: TranslateContext): HostPosition {
  const start = syntaxStart(syntax);
  return start === null ? ctx.origin : ctx.env.positionAt(start);
}

/**
 * Translate one piece of host syntax into shim commands, in host source order:
 * groups recurse, macros expand first, registered kinds go to their handler,
 * everything else is reprinted verbatim as a single command.
 */
export function elaborate(syntax: HostSyntax, ctx: TranslateContext): void {
  elaborateAt(syntax, ctx, 0);
}

function elaborateAt(syntax: HostSyntax, ctx: TranslateContext, depth: number): void {
  const origin = originOf(syntax, ctx);

  if (syntax.$kind === "Group") {
    for (const arg of syntax.args) elaborateAt(arg, ctx, depth);
    return;
  }

  if (syntax.$kind === "Node") {
    const expanded = ctx.env.expandMacro(syntax);
    if (expanded) {
      if (depth >= MAX_EXPANSION_DEPTH) {
        throw new InlayError(
          `macro expansion of '${syntax.kind}' exceeded ${MAX_EXPANSION_DEPTH} steps`,
          InlayErrorCode.UNREPRINTABLE_NODE,
          { kind: syntax.kind, position: origin },
        );
      }
      debug.translate("macro", { kind: syntax.kind, origin: formatPosition(origin) });
      elaborateAt(expanded, { ...ctx, origin }, depth + 1);
      return;
    }

    const handler = ctx.registry.lookup(syntax.kind);
    if (handler) {
      debug.translate("dispatch", { kind: syntax.kind, origin: formatPosition(origin) });
      handler(syntax, { ...ctx, origin });
      return;
    }
  }

  const kind = syntaxKind(syntax);
  const text = reprint(syntax, { ...ctx, origin });
  if (text === null) {
    throw new InlayError(`cannot translate '${kind}' into shim code`, InlayErrorCode.UNREPRINTABLE_NODE, {
      kind,
      position: origin,
    });
  }
  const command = text.trim();
  if (command.length === 0) return;
  debug.translate("reprint", { kind, origin: formatPosition(origin) });
  pushShimCommand(ctx.env, command, origin);
}

/**
 * Elaborate a batch of commands, each on its own: a failing command reports
 * one host error and leaves no state behind (shim text, boundary records),
 * and the next command still runs.
 * Internal invariant breaks propagate.
 */
export function elaborateCommands(commands: readonly HostSyntax[], ctx: TranslateContext): number {
  let failures = 0;
  for (const command of commands) {
    const origin = originOf(command, ctx);
    const restore = snapshotEnv(ctx.env);
    try {
      elaborate(command, { ...ctx, origin });
    } catch (err) {
      if (!isInlayError(err) || err.code === InlayErrorCode.ORDERING_VIOLATION) throw err;
      restore();
      failures += 1;
      reportCommandError(ctx.env, command, err.position ?? origin, err.message);
    }
  }
  return failures;
}

export function reportCommandError(
  env: HostEnvironment,
  command: HostSyntax,
  start: HostPosition,
  text: string,
): void {
  const endOffset = syntaxEnd(command);
  const end = endOffset === null ? start : env.positionAt(endOffset);
  env.logMessage({ fileName: env.fileName, severity: "error", start, end, text });
}
