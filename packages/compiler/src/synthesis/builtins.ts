import type { NodeSyntax } from "../model/syntax.js";
import { InlayError, InlayErrorCode } from "../shared/errors.js";
import { BOUNDARY_KIND, parseBoundaryDeclaration } from "./boundary/declaration.js";
import { generateBoundary, lookupBoundary } from "./boundary/generator.js";
import type { BoundaryRecord, BoundaryRuntime } from "./boundary/types.js";
import { TranslatorRegistry, type InlineTranslator, type TranslateContext } from "./shim/registry.js";
import { reprint } from "./shim/reprint.js";
import { elaborateCommands, originOf } from "./shim/translator.js";

export const SECTION_KIND = "inlay.section";
export const TO_HOST_KIND = "inlay.toHost";
export const OF_HOST_KIND = "inlay.ofHost";

export interface DefaultRegistryOptions {
  runtime?: BoundaryRuntime;
}

/** Registry with the built-in command and inline kinds. */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): TranslatorRegistry {
  const { runtime } = options;
  return new TranslatorRegistry()
    .define(SECTION_KIND, (node, ctx) => {
      elaborateCommands(node.args, ctx);
    })
    .define(BOUNDARY_KIND, (node, ctx) => {
      generateBoundary(parseBoundaryDeclaration(node, ctx), ctx, runtime);
    })
    .defineInline(TO_HOST_KIND, boundaryCall("toHost", (record) => record.wrapName))
    .defineInline(OF_HOST_KIND, boundaryCall("ofHost", (record) => record.unwrapName));
}

/**
 * `(typeIdent, expr)` printed as a call of the boundary function recorded
 * for the resolved type. The type ident's leading whitespace and the
 * expression's trailing whitespace stay around the call.
 */
function boundaryCall(label: string, pick: (record: BoundaryRecord) => string): InlineTranslator {
  return (node, ctx) => {
    const [type, expr] = node.args;
    if (type?.$kind !== "Ident" || !expr) {
      throw unsupported(`${label} needs a boundary type and an expression`, node, ctx);
    }
    const record = resolveBoundary(type.name, node, ctx);
    const inner = reprint(expr, ctx);
    if (inner === null) return null;
    const leading = type.info?.leading ?? "";
    const trailing = /\s*$/.exec(inner)?.[0] ?? "";
    return `${leading}${pick(record)}(${inner.trim()})${trailing}`;
  };
}

function resolveBoundary(name: string, node: NodeSyntax, ctx: TranslateContext): BoundaryRecord {
  const candidates = ctx.env.resolveGlobalName(name);
  const [declaredName] = candidates;
  if (candidates.length !== 1 || declaredName === undefined) {
    throw new InlayError(`boundary type '${name}' does not resolve to one declaration`, InlayErrorCode.NAME_RESOLUTION, {
      kind: node.kind,
      position: originOf(node, ctx),
    });
  }
  const record = lookupBoundary(ctx.env, declaredName);
  if (!record) throw unsupported(`no boundary code was generated for '${declaredName}'`, node, ctx);
  return record;
}

function unsupported(message: string, node: NodeSyntax, ctx: TranslateContext): InlayError {
  return new InlayError(message, InlayErrorCode.UNREPRINTABLE_NODE, {
    kind: node.kind,
    position: originOf(node, ctx),
  });
}
