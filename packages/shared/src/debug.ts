/**
 * Debug channels for the shim pipeline.
 *
 * Each subsystem owns a channel that is a no-op unless named in `INLAY_DEBUG`:
 * ```bash
 * INLAY_DEBUG=shim npm test              # shim buffer appends
 * INLAY_DEBUG=translate,client npm test  # several channels
 * INLAY_DEBUG=* npm test                 # everything
 * ```
 *
 * ```typescript
 * debug.translate("dispatch", { kind, handled: true });
 * debug.client("collect.timeout", { uri, timeoutMs });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.error so stdout stays free for tool protocols. */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.error,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["INLAY_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatDebugMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data ? { data } : {}),
      ...(config.timestamps ? { timestamp: Date.now() } : {}),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    const oneLine = value.replace(/\r?\n/g, "\\n");
    return oneLine.length > 60 ? `"${oneLine.slice(0, 57)}..."` : `"${oneLine}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) return `[${value.map((v) => formatValue(v)).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (value instanceof Error) return `<${value.name}: ${value.message}>`;
  if (typeof value === "object") {
    if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) return () => {};
  return (point, data) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/** Get or create a channel outside the built-in set. */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/** Re-read `INLAY_DEBUG` and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.shim = createChannel("shim");
  debug.translate = createChannel("translate");
  debug.boundary = createChannel("boundary");
  debug.diagnostics = createChannel("diagnostics");
  debug.client = createChannel("client");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Shim buffer appends and position records */
  shim: createChannel("shim"),

  /** Per-node dispatch: handler, macro expansion, verbatim reprint */
  translate: createChannel("translate"),

  /** Opaque-type boundary generation */
  boundary: createChannel("boundary"),

  /** Diagnostics filtering and remapping */
  diagnostics: createChannel("diagnostics"),

  /** Shim tool session traffic */
  client: createChannel("client"),
};

export type Debug = typeof debug;
