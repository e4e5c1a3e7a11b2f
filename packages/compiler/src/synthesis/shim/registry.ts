import type { HostEnvironment } from "../../model/environment.js";
import type { NodeSyntax } from "../../model/syntax.js";
import type { HostPosition } from "../../model/text.js";
import { InlayError, InlayErrorCode } from "../../shared/errors.js";

export interface TranslateContext {
  readonly env: HostEnvironment;
  readonly registry: TranslatorRegistry;
  /** Start of the command being elaborated; origin for synthetic syntax. */
  readonly origin: HostPosition;
}

/** Handles a whole command: pushes zero or more shim commands, may recurse. */
export type CommandTranslator = (node: NodeSyntax, ctx: TranslateContext) => void;

/** Produces text for a node nested inside a reprinted command, or null. */
export type InlineTranslator = (node: NodeSyntax, ctx: TranslateContext) => string | null;

/**
 * Node kind → handler table. Filled at registration time; kinds without a
 * handler are reprinted verbatim.
 */
export class TranslatorRegistry {
  readonly #commands = new Map<string, CommandTranslator>();
  readonly #inline = new Map<string, InlineTranslator>();

  define(kind: string, handler: CommandTranslator): this {
    this.#assertFree(kind);
    this.#commands.set(kind, handler);
    return this;
  }

  defineInline(kind: string, handler: InlineTranslator): this {
    this.#assertFree(kind);
    this.#inline.set(kind, handler);
    return this;
  }

  lookup(kind: string): CommandTranslator | undefined {
    return this.#commands.get(kind);
  }

  lookupInline(kind: string): InlineTranslator | undefined {
    return this.#inline.get(kind);
  }

  has(kind: string): boolean {
    return this.#commands.has(kind) || this.#inline.has(kind);
  }

  kinds(): string[] {
    return [...this.#commands.keys(), ...this.#inline.keys()].sort();
  }

  #assertFree(kind: string): void {
    if (this.has(kind)) {
      throw new InlayError(`a translator for '${kind}' is already registered`, InlayErrorCode.DUPLICATE_TRANSLATOR, {
        kind,
      });
    }
  }
}
