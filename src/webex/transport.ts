import { randomUUID } from "node:crypto";

import WebSocket from "ws";

import { rawDataByteLength, rawDataToString } from "../infra/ws.js";
import { type BotLogger, getChildLogger } from "../logging.js";
import { TransportError } from "./errors.js";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "listening"
  | "closing"
  | "closed";

export type InboundFrame =
  | { kind: "text"; text: string }
  | { kind: "binary"; byteLength: number }
  | { kind: "ping"; byteLength: number }
  | { kind: "pong"; byteLength: number }
  | { kind: "close"; code: number; reason: string };

type QueueItem = InboundFrame | { kind: "error"; error: Error };

export type AuthorizationFrame = {
  id: string;
  type: "authorization";
  data: { token: string };
};

export type RealtimeTransportOptions = {
  /** Bearer token sent in the authorization frame; relay endpoints take none. */
  token?: string;
  /** Stops the receive loop; checked once per frame and raced against the frame wait. */
  abortSignal?: AbortSignal;
  connectTimeoutMs?: number;
  /** Upper bound on waiting for the peer's Close reply. */
  closeTimeoutMs?: number;
  onStateChange?: (next: ConnectionState, prev: ConnectionState) => void;
  createSocket?: (url: string, options: WebSocket.ClientOptions) => WebSocket;
};

export type TextHandler = (text: string) => void | Promise<void>;

const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;
// Close code ws reports when the connection dropped without a Close frame.
const ABNORMAL_CLOSURE = 1006;

export function buildAuthorizationFrame(
  token: string,
  id: string = randomUUID(),
): AuthorizationFrame {
  return { id, type: "authorization", data: { token: `Bearer ${token}` } };
}

function describeEndpoint(url: URL): string {
  return `${url.protocol}//${url.host}${url.pathname}`;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class RealtimeTransport {
  private currentState: ConnectionState = "disconnected";
  private socket: WebSocket | null = null;
  private socketClosed: Promise<void> = Promise.resolve();
  private readonly queue: QueueItem[] = [];
  private waiter: ((item: QueueItem | null) => void) | null = null;
  private listening = false;
  private readonly log: BotLogger;

  constructor(private readonly options: RealtimeTransportOptions) {
    this.log = getChildLogger({ module: "realtime-transport" });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  private setState(next: ConnectionState) {
    const prev = this.currentState;
    if (prev === next) return;
    this.currentState = next;
    this.log.debug({ from: prev, to: next }, "transport state");
    this.options.onStateChange?.(next, prev);
  }

  async connect(endpointUrl: string): Promise<void> {
    if (this.currentState !== "disconnected") {
      throw new TransportError(
        "connect-failed",
        `Cannot connect: transport is ${this.currentState}`,
      );
    }
    this.setState("connecting");

    let url: URL;
    try {
      url = new URL(endpointUrl);
    } catch (err) {
      this.setState("closed");
      throw new TransportError("connect-failed", "Invalid realtime endpoint URL", { cause: err });
    }
    if (url.protocol !== "ws:" && url.protocol !== "wss:") {
      this.setState("closed");
      throw new TransportError(
        "connect-failed",
        `Unsupported realtime endpoint scheme ${url.protocol} (expected ws: or wss:)`,
      );
    }
    const secure = url.protocol === "wss:";
    if (this.options.abortSignal?.aborted) {
      this.setState("closed");
      throw new TransportError("connect-failed", "Connect aborted before the handshake");
    }

    const createSocket =
      this.options.createSocket ?? ((target, opts) => new WebSocket(target, opts));
    const socket = createSocket(url.toString(), {
      handshakeTimeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    });
    this.attach(socket);

    try {
      await this.waitForOpen(socket);
    } catch (err) {
      socket.terminate();
      this.socket = null;
      this.queue.length = 0;
      this.setState("closed");
      throw new TransportError(
        "connect-failed",
        `${secure ? "Secure" : "Plain"} WebSocket handshake with ${describeEndpoint(url)} failed`,
        { cause: err },
      );
    }
    this.log.info(
      { endpoint: describeEndpoint(url), secure },
      `${secure ? "secure" : "insecure"} websocket opened`,
    );

    this.setState("authenticating");
    const token = this.options.token;
    if (token === undefined) {
      this.setState("listening");
      return;
    }
    const auth = buildAuthorizationFrame(token);
    try {
      await this.write(socket, JSON.stringify(auth));
    } catch (err) {
      socket.terminate();
      this.socket = null;
      this.setState("closed");
      throw new TransportError("connect-failed", "Failed to send the authorization frame", {
        cause: err,
      });
    }
    this.log.debug({ id: auth.id }, "authorization frame sent");
    // The cloud does not acknowledge authorization; listening starts right away.
    this.setState("listening");
  }

  async send(text: string): Promise<void> {
    const socket = this.socket;
    if (this.currentState !== "listening" || !socket) {
      throw new TransportError("not-ready", `Cannot send: transport is ${this.currentState}`);
    }
    try {
      await this.write(socket, text);
    } catch (err) {
      throw new TransportError("peer-away", "WebSocket write failed", { cause: err });
    }
  }

  /**
   * Runs the receive loop. Resolves when the abort signal fires (the
   * connection stays open for `close()`) or when the peer sends a Close frame.
   * Rejects with `peer-away` when the stream fails.
   */
  async listenForMessages(onText: TextHandler): Promise<void> {
    if (this.currentState !== "listening" || !this.socket) {
      throw new TransportError("not-ready", `Cannot listen: transport is ${this.currentState}`);
    }
    if (this.listening) {
      throw new TransportError("not-ready", "Receive loop is already running");
    }
    this.listening = true;
    try {
      await this.receiveLoop(onText);
    } finally {
      this.listening = false;
    }
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (this.currentState !== "listening" || !socket) return;
    this.setState("closing");
    const timeoutMs = this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    socket.close(1000, "client closing");
    const drained = await this.waitForSocketClosed(timeoutMs);
    if (!drained) {
      this.log.warn({ timeoutMs }, "peer did not acknowledge close; terminating");
      socket.terminate();
    }
    this.socket = null;
    this.setState("closed");
  }

  private async receiveLoop(onText: TextHandler): Promise<void> {
    const signal = this.options.abortSignal;
    while (true) {
      if (signal?.aborted) {
        this.log.info("shutdown requested; leaving receive loop");
        return;
      }
      const item = await this.nextItem(signal);
      if (!item) continue;

      switch (item.kind) {
        case "text":
          this.log.debug({ bytes: item.text.length }, "text frame received");
          try {
            await onText(item.text);
          } catch (err) {
            this.log.error({ error: String(err) }, "text frame handler failed");
          }
          break;
        case "binary":
          this.log.debug({ bytes: item.byteLength }, "binary frame ignored");
          break;
        case "ping":
        case "pong":
          this.log.debug({ bytes: item.byteLength }, `${item.kind} frame`);
          break;
        case "close":
          // close() already owns the shutdown when it initiated it.
          if (this.currentState !== "listening") return;
          if (item.code === ABNORMAL_CLOSURE) {
            this.setState("closing");
            this.socket = null;
            this.setState("closed");
            throw new TransportError("peer-away", "WebSocket went away without a Close frame");
          }
          this.log.warn({ code: item.code, reason: item.reason }, "close frame received");
          this.setState("closing");
          this.socket = null;
          this.setState("closed");
          return;
        case "error": {
          this.setState("closing");
          this.socket?.terminate();
          this.socket = null;
          this.setState("closed");
          throw new TransportError("peer-away", "WebSocket went away", { cause: item.error });
        }
      }
    }
  }

  private attach(socket: WebSocket) {
    this.socket = socket;
    let markClosed: () => void = () => {};
    this.socketClosed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });
    const push = (item: QueueItem) => {
      if (this.socket !== socket) return;
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter(item);
        return;
      }
      this.queue.push(item);
    };
    socket.on("message", (data, isBinary) => {
      push(
        isBinary
          ? { kind: "binary", byteLength: rawDataByteLength(data) }
          : { kind: "text", text: rawDataToString(data) },
      );
    });
    socket.on("ping", (data) => push({ kind: "ping", byteLength: data.length }));
    socket.on("pong", (data) => push({ kind: "pong", byteLength: data.length }));
    socket.on("close", (code, reason) => {
      markClosed();
      push({ kind: "close", code, reason: reason.toString("utf8") });
    });
    socket.on("error", (err) => push({ kind: "error", error: toError(err) }));
  }

  private nextItem(signal?: AbortSignal): Promise<QueueItem | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (signal?.aborted) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiter = null;
        resolve(null);
      };
      this.waiter = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private waitForOpen(socket: WebSocket): Promise<void> {
    const signal = this.options.abortSignal;
    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        socket.off("open", onOpen);
        socket.off("error", onError);
        socket.off("close", onClose);
        signal?.removeEventListener("abort", onAbort);
      };
      const onOpen = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const onClose = (code: number) => {
        cleanup();
        reject(new Error(`socket closed during handshake (code ${code})`));
      };
      const onAbort = () => {
        cleanup();
        reject(new Error("connect aborted"));
      };
      socket.once("open", onOpen);
      socket.once("error", onError);
      socket.once("close", onClose);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private waitForSocketClosed(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void this.socketClosed.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private write(socket: WebSocket, text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      socket.send(text, (err) => (err ? reject(err) : resolve()));
    });
  }
}
