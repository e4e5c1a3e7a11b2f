// Host positions and offset/line conversion. Lines are 1-based and columns
// 0-based, so (0,0) never names a real location and serves as the sentinel.
export interface HostPosition {
  readonly line: number;
  readonly column: number;
}

export const NO_POSITION: HostPosition = Object.freeze({ line: 0, column: 0 });

export function comparePositions(a: HostPosition, b: HostPosition): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

export function formatPosition(position: HostPosition): string {
  return `${position.line}:${position.column}`;
}

export interface LineIndex {
  readonly text: string;
  readonly lineStarts: readonly number[];
  positionAt(offset: number): HostPosition;
}

export function createLineIndex(text: string): LineIndex {
  const lineStarts = computeLineStarts(text);
  return {
    text,
    lineStarts,
    positionAt: (offset) => positionAtOffset(text, offset, lineStarts),
  };
}

export function positionAtOffset(
  text: string,
  offset: number,
  lineStarts: readonly number[] = computeLineStarts(text),
): HostPosition {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: clamped - (lineStarts[lo] ?? 0) };
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}
