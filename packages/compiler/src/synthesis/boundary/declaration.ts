import { tokensOf, tokenText, type HostSyntax, type NodeSyntax } from "../../model/syntax.js";
import { InlayError, InlayErrorCode } from "../../shared/errors.js";
import type { TranslateContext } from "../shim/registry.js";
import { originOf } from "../shim/translator.js";
import type { BoundaryConfig, BoundaryDeclaration } from "./types.js";

export const BOUNDARY_KIND = "inlay.boundary";
export const BOUNDARY_CONFIG_KIND = "inlay.boundaryConfig";
export const BOUNDARY_FIELD_KIND = "inlay.field";

type ConfigField = "wrap" | "unwrap" | "class" | "finalize" | "foreach";

const CONFIG_FIELDS: ReadonlySet<string> = new Set(["wrap", "unwrap", "class", "finalize", "foreach"]);

function isConfigField(key: string): key is ConfigField {
  return CONFIG_FIELDS.has(key);
}

/**
 * Read an `inlay.boundary` command:
 * `[Ident name, Group typeParams, Group shimType, Node inlay.boundaryConfig]`.
 */
export function parseBoundaryDeclaration(node: NodeSyntax, ctx: TranslateContext): BoundaryDeclaration {
  const [name, typeParams, shimType, config] = node.args;
  if (name?.$kind !== "Ident") {
    throw invalid("boundary declaration needs a type name", node, ctx);
  }
  return {
    name: name.name,
    typeParams: typeParams ? readTypeParams(typeParams, ctx) : [],
    config: readConfig(config, shimType, node, ctx),
  };
}

function readTypeParams(syntax: HostSyntax, ctx: TranslateContext): string[] {
  if (syntax.$kind !== "Group") throw invalid("boundary type parameters must be a group", syntax, ctx);
  return syntax.args.map((arg) => {
    if (arg.$kind !== "Ident") throw invalid("boundary type parameter must be an identifier", arg, ctx);
    return arg.name;
  });
}

/** Shim type tokens, space separated; an empty group means the default type. */
function readShimType(syntax: HostSyntax | undefined, ctx: TranslateContext): string | undefined {
  if (!syntax) return undefined;
  if (syntax.$kind === "Missing") throw invalid("boundary shim type is incomplete", syntax, ctx);
  const text = [...tokensOf(syntax)].map(tokenText).join(" ").trim();
  return text.length > 0 ? text : undefined;
}

function readConfig(
  syntax: HostSyntax | undefined,
  shimTypeSyntax: HostSyntax | undefined,
  decl: NodeSyntax,
  ctx: TranslateContext,
): BoundaryConfig {
  if (syntax?.$kind !== "Node" || syntax.kind !== BOUNDARY_CONFIG_KIND) {
    throw invalid("boundary declaration needs a configuration", syntax ?? decl, ctx);
  }
  const fields = new Map<ConfigField, string>();
  for (const field of syntax.args) {
    const [key, value] = readField(field, ctx);
    if (fields.has(key)) throw invalid(`boundary field '${key}' is given twice`, field, ctx);
    fields.set(key, value);
  }

  const finalizer = fields.get("finalize");
  const foreach = fields.get("foreach");
  if (finalizer === undefined) throw invalid("boundary configuration needs 'finalize'", syntax, ctx);
  if (foreach === undefined) throw invalid("boundary configuration needs 'foreach'", syntax, ctx);

  const shimType = readShimType(shimTypeSyntax, ctx);
  const wrapName = fields.get("wrap");
  const unwrapName = fields.get("unwrap");
  const className = fields.get("class");
  return {
    finalizer,
    foreach,
    ...(shimType !== undefined ? { shimType } : {}),
    ...(wrapName !== undefined ? { wrapName } : {}),
    ...(unwrapName !== undefined ? { unwrapName } : {}),
    ...(className !== undefined ? { className } : {}),
  };
}

function readField(field: HostSyntax, ctx: TranslateContext): [ConfigField, string] {
  if (field.$kind !== "Node" || field.kind !== BOUNDARY_FIELD_KIND) {
    throw invalid("boundary configuration entries must be fields", field, ctx);
  }
  const [key, value] = field.args;
  if (key?.$kind !== "Ident") throw invalid("boundary field key must be an identifier", field, ctx);
  const name = key.name;
  if (!isConfigField(name)) throw invalid(`unknown boundary field '${name}'`, field, ctx);
  if (value?.$kind === "Ident") return [name, value.name];
  if (value?.$kind === "Atom") return [name, unquote(value.value)];
  throw invalid(`boundary field '${name}' needs a name`, field, ctx);
}

function unquote(value: string): string {
  const quoted = value.length >= 2 && value.startsWith('"') && value.endsWith('"');
  return quoted ? value.slice(1, -1) : value;
}

function invalid(message: string, at: HostSyntax, ctx: TranslateContext): InlayError {
  return new InlayError(message, InlayErrorCode.INVALID_BOUNDARY_CONFIG, {
    kind: BOUNDARY_KIND,
    position: originOf(at, ctx),
  });
}
