import { comparePositions, NO_POSITION, type HostPosition } from "../../model/text.js";
import { InlayError, InlayErrorCode } from "../../shared/errors.js";

/** Start of one shim span and the host position it was emitted for. */
export interface PositionMapEntry {
  readonly shimStart: number;
  readonly host: HostPosition;
}

/**
 * Shim offset ⇄ host position map. Entries are sorted by shim offset and only
 * ever appended; every operation returns a new map.
 */
export class PositionMap {
  static readonly EMPTY = new PositionMap([]);

  readonly #entries: readonly PositionMapEntry[];

  private constructor(entries: readonly PositionMapEntry[]) {
    this.#entries = entries;
  }

  get size(): number {
    return this.#entries.length;
  }

  get lastStart(): number | undefined {
    return this.#entries[this.#entries.length - 1]?.shimStart;
  }

  entries(): readonly PositionMapEntry[] {
    return this.#entries;
  }

  record(shimStart: number, host: HostPosition): PositionMap {
    const last = this.lastStart;
    if (last !== undefined && shimStart < last) {
      throw new InlayError(
        `shim span at offset ${shimStart} recorded after a span at offset ${last}`,
        InlayErrorCode.ORDERING_VIOLATION,
        { position: host },
      );
    }
    return new PositionMap([...this.#entries, { shimStart, host }]);
  }

  /**
   * Host position of the span containing (or preceding) `offset`. Spans that
   * share a start resolve to the earliest one; offsets before the first span
   * resolve to the sentinel.
   */
  shimToHost(offset: number): HostPosition {
    const index = this.#floorIndex(offset);
    return index < 0 ? NO_POSITION : (this.#entries[index]?.host ?? NO_POSITION);
  }

  /**
   * Like `shimToHost` for an exclusive range end: a range that stops exactly
   * where the next span begins stays attributed to the earlier span.
   */
  shimEndToHost(start: number, end: number): HostPosition {
    return this.shimToHost(end > start ? end - 1 : end);
  }

  /** Shim start of the first span emitted at or after `position`. */
  hostToShim(position: HostPosition): number | undefined {
    return this.#entries.find((entry) => comparePositions(entry.host, position) >= 0)?.shimStart;
  }

  #floorIndex(offset: number): number {
    let lo = 0;
    let hi = this.#entries.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const start = this.#entries[mid]?.shimStart ?? Number.POSITIVE_INFINITY;
      if (start <= offset) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    if (found < 0) return found;
    const start = this.#entries[found]?.shimStart;
    while (found > 0 && this.#entries[found - 1]?.shimStart === start) found -= 1;
    return found;
  }
}
