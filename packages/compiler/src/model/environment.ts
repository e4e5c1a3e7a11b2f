import type { HostMessage } from "./messages.js";
import type { HostSyntax, NodeSyntax } from "./syntax.js";
import type { HostPosition } from "./text.js";

/** Raw option lookup; values are validated by whoever reads them. */
export interface OptionSource {
  get(key: string): unknown;
}

/**
 * The host compilation environment, as far as the shim pipeline needs it.
 * Elaboration is sequential: at most one step touches an environment at a time.
 */
export interface HostEnvironment {
  /** Identity that extension state is keyed by; one per compilation unit. */
  readonly scope: object;
  readonly fileName: string;
  readonly options: OptionSource;
  positionAt(offset: number): HostPosition;
  /** One expansion step, or null when `node` is not a macro use. */
  expandMacro(node: NodeSyntax): HostSyntax | null;
  isMacro(kind: string): boolean;
  declareOpaqueType(name: string, typeParams: readonly string[]): void;
  /** Fully-qualified candidates for `name` in the current scope. */
  resolveGlobalName(name: string): readonly string[];
  logMessage(message: HostMessage): void;
}

interface ExtensionSlot {
  capture(env: HostEnvironment): () => void;
}

const slots = new Set<ExtensionSlot>();

/**
 * Per-environment state slot, created lazily on first read and kept for the
 * rest of the compilation unit. Reads and writes are explicit (get/set).
 * Stored values are treated as immutable; `snapshotEnv` relies on it.
 */
export class EnvExtension<T> implements ExtensionSlot {
  readonly #states = new WeakMap<object, { value: T }>();

  constructor(
    public readonly name: string,
    private readonly initial: () => T,
  ) {
    slots.add(this);
  }

  get(env: HostEnvironment): T {
    const cell = this.#states.get(env.scope);
    if (cell) return cell.value;
    const value = this.initial();
    this.#states.set(env.scope, { value });
    return value;
  }

  set(env: HostEnvironment, value: T): void {
    this.#states.set(env.scope, { value });
  }

  modify(env: HostEnvironment, fn: (current: T) => T): T {
    const next = fn(this.get(env));
    this.set(env, next);
    return next;
  }

  capture(env: HostEnvironment): () => void {
    const cell = this.#states.get(env.scope);
    return () => {
      if (cell) this.#states.set(env.scope, cell);
      else this.#states.delete(env.scope);
    };
  }
}

/** Capture the state of every extension for `env`; the returned function puts it back. */
export function snapshotEnv(env: HostEnvironment): () => void {
  const restores = [...slots].map((slot) => slot.capture(env));
  return () => {
    for (const restore of restores) restore();
  };
}
