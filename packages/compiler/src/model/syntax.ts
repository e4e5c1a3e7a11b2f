/* =============================================================================
 * Host syntax
 * -----------------------------------------------------------------------------
 * The already-parsed trees the host hands over. Shim fragments arrive as
 * ordinary host syntax: tokens keep the whitespace they were written with so
 * they can be reprinted verbatim.
 * ============================================================================= */

/** Where a token came from, and the whitespace around it. */
export interface SourceInfo {
  readonly leading: string;
  /** Host offset of the token's first character. */
  readonly pos: number;
  readonly trailing: string;
}

/** Null node: an ordered grouping with no meaning of its own. */
export interface GroupSyntax {
  readonly $kind: "Group";
  readonly args: readonly HostSyntax[];
}

export interface AtomSyntax {
  readonly $kind: "Atom";
  readonly value: string;
  readonly info?: SourceInfo;
}

export interface IdentSyntax {
  readonly $kind: "Ident";
  /** Possibly dotted host name, e.g. `Sys.Handle`. */
  readonly name: string;
  readonly info?: SourceInfo;
}

export interface NodeSyntax {
  readonly $kind: "Node";
  readonly kind: string;
  readonly args: readonly HostSyntax[];
}

/** Parser recovery hole. */
export interface MissingSyntax {
  readonly $kind: "Missing";
}

export type HostSyntax = GroupSyntax | AtomSyntax | IdentSyntax | NodeSyntax | MissingSyntax;

export type TokenSyntax = AtomSyntax | IdentSyntax;

export const GROUP_KIND = "null";

/** Kind tag used for dispatch and in error messages. */
export function syntaxKind(node: HostSyntax): string {
  switch (node.$kind) {
    case "Group":
      return GROUP_KIND;
    case "Atom":
      return "atom";
    case "Ident":
      return "ident";
    case "Missing":
      return "missing";
    case "Node":
      return node.kind;
  }
}

export function tokenText(token: TokenSyntax): string {
  return token.$kind === "Atom" ? token.value : token.name;
}

export function* tokensOf(node: HostSyntax): Generator<TokenSyntax> {
  switch (node.$kind) {
    case "Atom":
    case "Ident":
      yield node;
      return;
    case "Group":
    case "Node":
      for (const arg of node.args) yield* tokensOf(arg);
      return;
    case "Missing":
      return;
  }
}

/** Host offset of the first positioned token, or null for synthetic syntax. */
export function syntaxStart(node: HostSyntax): number | null {
  for (const token of tokensOf(node)) {
    if (token.info) return token.info.pos;
  }
  return null;
}

/** Host offset just past the last positioned token. */
export function syntaxEnd(node: HostSyntax): number | null {
  let end: number | null = null;
  for (const token of tokensOf(node)) {
    if (token.info) end = token.info.pos + tokenText(token).length;
  }
  return end;
}

/* -----------------------------------------------------------------------------
 * Constructors
 * --------------------------------------------------------------------------- */

export function atom(value: string, info?: SourceInfo): AtomSyntax {
  return info ? { $kind: "Atom", value, info } : { $kind: "Atom", value };
}

export function ident(name: string, info?: SourceInfo): IdentSyntax {
  return info ? { $kind: "Ident", name, info } : { $kind: "Ident", name };
}

export function node(kind: string, args: readonly HostSyntax[]): NodeSyntax {
  return { $kind: "Node", kind, args };
}

export function group(args: readonly HostSyntax[]): GroupSyntax {
  return { $kind: "Group", args };
}

export const MISSING: MissingSyntax = { $kind: "Missing" };

export function sourceInfo(pos: number, leading = "", trailing = ""): SourceInfo {
  return { leading, pos, trailing };
}
