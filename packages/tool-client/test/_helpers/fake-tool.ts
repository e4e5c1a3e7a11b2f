import { PassThrough, type Readable, type Writable } from "node:stream";
import {
  StreamMessageReader,
  StreamMessageWriter,
  createMessageConnection,
  type MessageConnection,
} from "vscode-languageserver/node.js";

export interface OpenedDocument {
  uri: string;
  languageId: string;
  version: number;
  text: string;
}

type OpenBehavior = (doc: OpenedDocument, tool: FakeToolServer) => void;

export interface FakeToolServer {
  /** In-process stand-in for the tool. */
  readonly server: MessageConnection;
  readonly opened: OpenedDocument[];
  readonly closed: string[];
  readonly requests: { method: string; params: unknown }[];
  readonly notifications: string[];
  onOpen(behavior: OpenBehavior): void;
  publish(uri: string, diagnostics: unknown[]): void;
  status(uri: string, state: string): void;
  /** Simulate the tool going away mid-session. */
  hangUp(): void;
}

export interface FakeTool extends FakeToolServer {
  /** Client end, handed to ToolSession. */
  readonly client: MessageConnection;
}

export const FILE_STATUS = "textDocument/clangd.fileStatus";

export function createFakeTool(): FakeTool {
  const toServer = new PassThrough();
  const toClient = new PassThrough();
  const client = createMessageConnection(new StreamMessageReader(toClient), new StreamMessageWriter(toServer));
  return { ...serveFakeTool(toServer, toClient), client };
}

/** Tool side of the protocol, reading requests from `input` and answering on `output`. */
export function serveFakeTool(input: Readable, output: Writable): FakeToolServer {
  const server = createMessageConnection(new StreamMessageReader(input), new StreamMessageWriter(output));

  const opened: OpenedDocument[] = [];
  const closed: string[] = [];
  const requests: { method: string; params: unknown }[] = [];
  const notifications: string[] = [];
  let behavior: OpenBehavior | null = null;

  const tool: FakeToolServer = {
    server,
    opened,
    closed,
    requests,
    notifications,
    onOpen(next) {
      behavior = next;
    },
    publish(uri, diagnostics) {
      void server.sendNotification("textDocument/publishDiagnostics", { uri, diagnostics });
    },
    status(uri, state) {
      void server.sendNotification(FILE_STATUS, { uri, state });
    },
    hangUp() {
      output.end();
    },
  };

  server.onRequest("initialize", (params: unknown) => {
    requests.push({ method: "initialize", params });
    return { capabilities: {} };
  });
  server.onRequest("shutdown", () => {
    requests.push({ method: "shutdown", params: null });
    return null;
  });
  server.onNotification("initialized", () => notifications.push("initialized"));
  server.onNotification("exit", () => notifications.push("exit"));
  server.onNotification("textDocument/didOpen", (params: { textDocument: OpenedDocument }) => {
    opened.push(params.textDocument);
    behavior?.(params.textDocument, tool);
  });
  server.onNotification("textDocument/didClose", (params: { textDocument: { uri: string } }) => {
    closed.push(params.textDocument.uri);
  });
  server.listen();

  return tool;
}
