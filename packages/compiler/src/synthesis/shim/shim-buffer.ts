import { debug } from "@inlay/shared";
import { EnvExtension, type HostEnvironment } from "../../model/environment.js";
import { formatPosition, type HostPosition } from "../../model/text.js";
import { PositionMap } from "./position-map.js";

/** One top-level shim command as it was appended. */
export interface ShimCommand {
  readonly text: string;
  readonly origin: HostPosition;
  readonly shimStart: number;
}

/**
 * The synthetic shim source for one compilation unit: its text, the
 * position map back to the host, and the command log. Values are immutable;
 * `pushCommand` returns the next buffer and leaves the receiver untouched.
 */
export class ShimBuffer {
  static readonly EMPTY = new ShimBuffer("", PositionMap.EMPTY, []);

  private constructor(
    readonly text: string,
    readonly map: PositionMap,
    readonly commands: readonly ShimCommand[],
  ) {}

  /** Append `renderedText` as one command, newline-terminated. */
  pushCommand(renderedText: string, origin: HostPosition): ShimBuffer {
    const shimStart = this.text.length;
    const map = this.map.record(shimStart, origin);
    const line = renderedText.endsWith("\n") ? renderedText : `${renderedText}\n`;
    debug.shim("push", { origin: formatPosition(origin), shimStart, length: line.length });
    return new ShimBuffer(this.text + line, map, [...this.commands, { text: line, origin, shimStart }]);
  }

  currentEndOffset(): number {
    return this.text.length;
  }

  sourceText(): string {
    return this.text;
  }
}

export const shimExtension = new EnvExtension<ShimBuffer>("inlay.shim", () => ShimBuffer.EMPTY);

export function getShim(env: HostEnvironment): ShimBuffer {
  return shimExtension.get(env);
}

export function setShim(env: HostEnvironment, shim: ShimBuffer): void {
  shimExtension.set(env, shim);
}

export function modifyShim(env: HostEnvironment, fn: (shim: ShimBuffer) => ShimBuffer): ShimBuffer {
  return shimExtension.modify(env, fn);
}

/** Read the environment's buffer, append one command, store the result. */
export function pushShimCommand(env: HostEnvironment, renderedText: string, origin: HostPosition): ShimBuffer {
  return modifyShim(env, (shim) => shim.pushCommand(renderedText, origin));
}
