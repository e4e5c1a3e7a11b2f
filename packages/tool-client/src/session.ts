/**
 * JSON-RPC session with the shim tool.
 *
 * One session owns one connection (and, when spawned here, one subprocess).
 * Notifications are fanned out to temporary listeners so that `collect` can
 * attach and detach its handlers without touching the connection's own
 * single-handler-per-method registry.
 */
import { spawn, type ChildProcess } from "node:child_process";
import {
  StreamMessageReader,
  StreamMessageWriter,
  createMessageConnection,
  type Disposable,
  type MessageConnection,
} from "vscode-languageserver/node.js";
import { createPrefixedLogger, debug, NOOP_LOGGER, type Logger } from "@inlay/shared";
import { OneShotSignal } from "./signal.js";
import {
  Methods,
  isFileStatusParams,
  isPublishDiagnosticsParams,
  toDiagnosticRecord,
  type DiagnosticRecord,
} from "./protocol.js";
import { ToolError, ToolTimeoutError, toToolError, type CollectResult } from "./errors.js";
import { resolveTool, type ToolDefinition } from "./tools.js";

type NotificationListener = (params: unknown) => void;
type FailureWatcher = (error: ToolError) => void;

type CollectOutcome = { kind: "idle" } | { kind: "timeout" } | { kind: "failed"; error: ToolError };

const SHUTDOWN_GRACE_MS = 2000;

export interface ToolSessionOptions {
  tool: ToolDefinition;
  logger?: Logger;
  /** Subprocess behind the connection; its exit fails the session. */
  child?: ChildProcess | null;
}

export interface CollectRequest {
  uri: string;
  text: string;
  languageId?: string;
  timeoutMs: number;
}

export class ToolSession {
  readonly tool: ToolDefinition;
  #connection: MessageConnection;
  #child: ChildProcess | null;
  #logger: Logger;
  #listeners = new Map<string, Set<NotificationListener>>();
  #failureWatchers = new Set<FailureWatcher>();
  #subscriptions: Disposable[] = [];
  #openDocuments = new Set<string>();
  #versions = new Map<string, number>();
  #failure: ToolError | null = null;
  #initialized = false;
  #disposed = false;

  /** Takes ownership of `connection` and starts listening on it. */
  constructor(connection: MessageConnection, options: ToolSessionOptions) {
    this.tool = options.tool;
    this.#connection = connection;
    this.#child = options.child ?? null;
    this.#logger = createPrefixedLogger(this.tool.id, options.logger ?? NOOP_LOGGER);

    for (const method of [Methods.publishDiagnostics, this.tool.fileStatusMethod]) {
      this.#subscriptions.push(connection.onNotification(method, (params: unknown) => this.#dispatch(method, params)));
    }
    this.#subscriptions.push(connection.onClose(() => this.#fail(new ToolError("connection to shim tool closed"))));
    this.#subscriptions.push(connection.onError(([error]) => this.#fail(toToolError(error, "shim tool protocol error"))));

    this.#child?.once("exit", (code, signal) => {
      this.#fail(new ToolError(`shim tool exited (code=${code ?? "null"} signal=${signal ?? "null"})`));
    });
    this.#child?.once("error", (err) => this.#fail(toToolError(err, "shim tool failed to start")));

    connection.listen();
  }

  get initialized(): boolean {
    return this.#initialized;
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  /** Temporary notification listeners currently attached. */
  get handlerCount(): number {
    let count = 0;
    for (const set of this.#listeners.values()) count += set.size;
    return count + this.#failureWatchers.size;
  }

  get openDocuments(): ReadonlySet<string> {
    return this.#openDocuments;
  }

  async initialize(rootUri: string | null): Promise<void> {
    if (this.#initialized) return;
    await this.#guard(
      this.#connection.sendRequest(Methods.initialize, {
        processId: process.pid,
        rootUri,
        capabilities: {
          textDocument: {
            publishDiagnostics: { relatedInformation: false },
            synchronization: { dynamicRegistration: false, didSave: false },
          },
        },
        initializationOptions: this.tool.initializationOptions ?? null,
      }),
    );
    await this.#connection.sendNotification(Methods.initialized, {});
    this.#initialized = true;
    debug.client("initialized", { tool: this.tool.id, rootUri });
  }

  /**
   * Open `uri` with `text`, wait until the tool reports it idle, and return the
   * last diagnostics published for it. Listeners, the timer and the open
   * document are released on every exit path.
   */
  async collect(request: CollectRequest): Promise<CollectResult> {
    const { uri, text, timeoutMs } = request;
    const languageId = request.languageId ?? this.tool.languageId;
    if (this.#failure) return { ok: false, error: this.#failure };
    if (this.#disposed) return { ok: false, error: new ToolError("shim tool session is disposed") };
    if (this.#openDocuments.has(uri)) {
      return { ok: false, error: new ToolError(`${uri} is already open in the shim tool`) };
    }

    const signal = new OneShotSignal<CollectOutcome>();
    let diagnostics: readonly DiagnosticRecord[] = [];
    const releases: (() => void)[] = [];
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      releases.push(
        this.#listen(Methods.publishDiagnostics, (params) => {
          if (!isPublishDiagnosticsParams(params) || params.uri !== uri) return;
          diagnostics = params.diagnostics.map(toDiagnosticRecord);
          debug.client("collect.publish", { uri, count: diagnostics.length });
        }),
      );
      releases.push(
        this.#listen(this.tool.fileStatusMethod, (params) => {
          if (!isFileStatusParams(params) || params.uri !== uri) return;
          if (params.state === this.tool.idleState) signal.resolve({ kind: "idle" });
        }),
      );
      releases.push(this.#watchFailure((error) => signal.resolve({ kind: "failed", error })));

      await this.#openDocument(uri, languageId, text);
      timer = setTimeout(() => signal.resolve({ kind: "timeout" }), timeoutMs);

      const outcome = await signal.promise;
      debug.client("collect.outcome", { uri, outcome: outcome.kind });
      switch (outcome.kind) {
        case "idle":
          return { ok: true, diagnostics };
        case "timeout":
          return { ok: false, error: new ToolTimeoutError(uri, timeoutMs) };
        case "failed":
          return { ok: false, error: outcome.error };
      }
    } catch (err) {
      return { ok: false, error: toToolError(err, `failed to open ${uri} in the shim tool`) };
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      for (const release of releases.reverse()) release();
      await this.#closeDocument(uri);
    }
  }

  async dispose(): Promise<void> {
    if (this.#disposed) return;
    this.#disposed = true;
    try {
      if (this.#initialized && !this.#failure) {
        await this.#withGrace(this.#connection.sendRequest(Methods.shutdown));
        await this.#connection.sendNotification(Methods.exit);
      }
    } catch (err) {
      this.#logger.warn(`shim tool shutdown failed: ${toToolError(err, "shutdown").message}`);
    } finally {
      for (const sub of this.#subscriptions) sub.dispose();
      this.#subscriptions = [];
      this.#listeners.clear();
      this.#failureWatchers.clear();
      this.#connection.dispose();
      if (this.#child && this.#child.exitCode === null) this.#child.kill("SIGTERM");
    }
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  #dispatch(method: string, params: unknown): void {
    const listeners = this.#listeners.get(method);
    if (!listeners) return;
    for (const listener of [...listeners]) listener(params);
  }

  #listen(method: string, listener: NotificationListener): () => void {
    let set = this.#listeners.get(method);
    if (!set) {
      set = new Set();
      this.#listeners.set(method, set);
    }
    set.add(listener);
    return () => {
      const current = this.#listeners.get(method);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.#listeners.delete(method);
    };
  }

  #watchFailure(watcher: FailureWatcher): () => void {
    this.#failureWatchers.add(watcher);
    return () => {
      this.#failureWatchers.delete(watcher);
    };
  }

  #fail(error: ToolError): void {
    if (this.#failure || this.#disposed) return;
    this.#failure = error;
    this.#logger.warn(error.message);
    for (const watcher of [...this.#failureWatchers]) watcher(error);
  }

  /** Reject `work` as soon as the session fails. */
  #guard<T>(work: Promise<T>): Promise<T> {
    if (this.#failure) return Promise.reject(this.#failure);
    return new Promise<T>((resolve, reject) => {
      const stop = this.#watchFailure(reject);
      work.then(
        (value) => {
          stop();
          resolve(value);
        },
        (err: unknown) => {
          stop();
          reject(err);
        },
      );
    });
  }

  /** Resolve after `work` settles or the grace period passes, whichever is first. */
  async #withGrace<T>(work: Promise<T>): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, SHUTDOWN_GRACE_MS);
    });
    try {
      await Promise.race([work.then(() => undefined), grace]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }

  async #openDocument(uri: string, languageId: string, text: string): Promise<void> {
    const version = (this.#versions.get(uri) ?? 0) + 1;
    this.#versions.set(uri, version);
    this.#openDocuments.add(uri);
    debug.client("didOpen", { uri, version, length: text.length });
    await this.#connection.sendNotification(Methods.didOpen, {
      textDocument: { uri, languageId, version, text },
    });
  }

  async #closeDocument(uri: string): Promise<void> {
    if (!this.#openDocuments.delete(uri)) return;
    if (this.#failure || this.#disposed) return;
    try {
      await this.#connection.sendNotification(Methods.didClose, { textDocument: { uri } });
    } catch (err) {
      this.#logger.warn(`failed to close ${uri} in the shim tool: ${toToolError(err, "didClose").message}`);
    }
  }
}

export interface StartToolSessionOptions {
  cwd?: string;
  rootUri?: string | null;
  logger?: Logger;
}

/** Spawn the tool in stdio mode and complete the initialize handshake. */
export async function startToolSession(
  tool: ToolDefinition = resolveTool(),
  options: StartToolSessionOptions = {},
): Promise<ToolSession> {
  const [command, ...args] = tool.command;
  if (!command) throw new ToolError(`shim tool ${tool.id} has an empty command`);
  const stderrLogger = createPrefixedLogger(tool.id, options.logger ?? NOOP_LOGGER);

  const child = spawn(command, args, {
    cwd: options.cwd ?? process.cwd(),
    stdio: ["pipe", "pipe", "pipe"],
    env: { ...process.env, ...tool.env },
  });
  child.stderr.on("data", (chunk: Buffer) => {
    stderrLogger.log(chunk.toString("utf8").trimEnd());
  });

  const connection = createMessageConnection(
    new StreamMessageReader(child.stdout),
    new StreamMessageWriter(child.stdin),
  );
  const session = new ToolSession(connection, {
    tool,
    child,
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
  });
  try {
    await session.initialize(options.rootUri ?? null);
  } catch (err) {
    await session.dispose();
    throw toToolError(err, `failed to initialize shim tool ${tool.id}`);
  }
  return session;
}
