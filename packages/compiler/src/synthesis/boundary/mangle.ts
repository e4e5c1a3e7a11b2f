const PLAIN = /^[A-Za-z0-9]$/;

/**
 * Shim-safe spelling of a dotted host name: `l_` prefix, components joined
 * by `_`, literal underscores doubled, anything else as `_uXXXX` / `_UXXXXXXXX`.
 */
export function mangleName(name: string, prefix = "l_"): string {
  return prefix + name.split(".").map(mangleComponent).join("_");
}

function mangleComponent(component: string): string {
  let out = "";
  for (const ch of component) {
    if (PLAIN.test(ch)) {
      out += ch;
    } else if (ch === "_") {
      out += "__";
    } else {
      const code = ch.codePointAt(0) ?? 0;
      out += code <= 0xffff ? `_u${hex(code, 4)}` : `_U${hex(code, 8)}`;
    }
  }
  return out;
}

function hex(code: number, width: number): string {
  return code.toString(16).padStart(width, "0");
}

const SHIM_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isShimIdentifier(name: string): boolean {
  return SHIM_IDENTIFIER.test(name);
}
