import type { HostPosition } from "../model/text.js";

export const InlayErrorCode = {
  /** A span was recorded below the buffer's end. Indicates a bug, never user input. */
  ORDERING_VIOLATION: "INLAY_ORDERING_VIOLATION",
  UNREPRINTABLE_NODE: "INLAY_UNREPRINTABLE_NODE",
  NAME_RESOLUTION: "INLAY_NAME_RESOLUTION",
  DUPLICATE_TRANSLATOR: "INLAY_DUPLICATE_TRANSLATOR",
  DUPLICATE_BOUNDARY: "INLAY_DUPLICATE_BOUNDARY",
  INVALID_BOUNDARY_CONFIG: "INLAY_INVALID_BOUNDARY_CONFIG",
} as const;

export type InlayErrorCodeType = (typeof InlayErrorCode)[keyof typeof InlayErrorCode];

export interface InlayErrorDetails {
  /** Syntax kind involved, when there is one. */
  kind?: string;
  position?: HostPosition;
}

export class InlayError extends Error {
  readonly kind: string | undefined;
  readonly position: HostPosition | undefined;

  constructor(
    message: string,
    public readonly code: InlayErrorCodeType,
    details: InlayErrorDetails = {},
  ) {
    super(message);
    this.name = "InlayError";
    this.kind = details.kind;
    this.position = details.position;
  }
}

export function isInlayError(value: unknown, code?: InlayErrorCodeType): value is InlayError {
  return value instanceof InlayError && (code === undefined || value.code === code);
}
