import { tokenText, type HostSyntax, type TokenSyntax } from "../../model/syntax.js";
import type { TranslateContext } from "./registry.js";

// Control characters other than tab, LF and CR have no shim spelling.
const UNPRINTABLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

/**
 * Verbatim surface reprint. Tokens keep their original whitespace; synthetic
 * tokens (no source info) are separated by a single space. Returns null when
 * some part of the tree has no surface spelling: a recovery hole, an
 * unexpanded macro, an unprintable token, or an inline handler that declines.
 */
export function reprint(syntax: HostSyntax, ctx: TranslateContext): string | null {
  switch (syntax.$kind) {
    case "Missing":
      return null;
    case "Atom":
    case "Ident":
      return printToken(syntax);
    case "Group":
      return reprintAll(syntax.args, ctx);
    case "Node": {
      const inline = ctx.registry.lookupInline(syntax.kind);
      if (inline) return inline(syntax, ctx);
      if (ctx.env.isMacro(syntax.kind)) return null;
      return reprintAll(syntax.args, ctx);
    }
  }
}

function reprintAll(args: readonly HostSyntax[], ctx: TranslateContext): string | null {
  let out = "";
  for (const arg of args) {
    const printed = reprint(arg, ctx);
    if (printed === null) return null;
    out += printed;
  }
  return out;
}

function printToken(token: TokenSyntax): string | null {
  const text = tokenText(token);
  if (UNPRINTABLE.test(text)) return null;
  if (!token.info) return `${text} `;
  return `${token.info.leading}${text}${token.info.trailing}`;
}
