import type { HostPosition } from "./text.js";

export type MessageSeverity = "error" | "warning" | "information";

/** A record for the host's message sink. */
export interface HostMessage {
  readonly fileName: string;
  readonly severity: MessageSeverity;
  readonly start: HostPosition;
  readonly end: HostPosition;
  readonly text: string;
}
