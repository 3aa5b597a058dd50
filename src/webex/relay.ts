import { z } from "zod";

import { resolveFetch, withRequestTimeout } from "../infra/fetch.js";
import { type BotLogger, getChildLogger } from "../logging.js";
import { RelayError } from "./errors.js";
import {
  type ConnectionState,
  RealtimeTransport,
  type RealtimeTransportOptions,
  type TextHandler,
} from "./transport.js";

export type RelayServerConfig = {
  host: string;
  port: number;
  userId: string;
  /** Groups the connection is subscribed to on register. */
  groups: string[];
  /** Use https/wss instead of http/ws. */
  secure?: boolean;
};

export type RelayClientOptions = Omit<RealtimeTransportOptions, "token"> & {
  server: RelayServerConfig;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

const RegisterResponseSchema = z.object({ url: z.string().min(1) });

/**
 * Client for a self-hosted relay: registers a subscription over HTTP, then
 * receives the relayed frames on the WebSocket URL the relay hands back.
 */
export class RelayClient {
  private readonly transport: RealtimeTransport;
  private readonly fetchImpl: typeof fetch;
  private readonly log: BotLogger;

  constructor(private readonly options: RelayClientOptions) {
    const { server: _server, fetchImpl, timeoutMs: _timeoutMs, ...transportOptions } = options;
    this.transport = new RealtimeTransport(transportOptions);
    this.fetchImpl = resolveFetch(fetchImpl);
    this.log = getChildLogger({ module: "relay" });
  }

  get state(): ConnectionState {
    return this.transport.state;
  }

  /** Registers this user's groups and returns the WebSocket URL to connect to. */
  async register(endpoint: string): Promise<string> {
    const { server } = this.options;
    const payload = await this.post(endpoint, { user_id: server.userId, groups: server.groups });
    const parsed = RegisterResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RelayError(`Relay register on ${this.endpointUrl(endpoint)} returned no url`);
    }
    this.log.info({ groups: server.groups.length }, "registered with relay");
    return parsed.data.url;
  }

  async publish(endpoint: string, group: string, message: unknown): Promise<void> {
    const text = typeof message === "string" ? message : JSON.stringify(message);
    await this.post(endpoint, { user_id: this.options.server.userId, group, message: text });
    this.log.debug({ group }, "published to relay");
  }

  connect(url: string): Promise<void> {
    return this.transport.connect(url);
  }

  send(text: string): Promise<void> {
    return this.transport.send(text);
  }

  listenForMessages(onText: TextHandler): Promise<void> {
    return this.transport.listenForMessages(onText);
  }

  close(): Promise<void> {
    return this.transport.close();
  }

  private endpointUrl(endpoint: string): string {
    const { host, port, secure } = this.options.server;
    return `${secure ? "https" : "http"}://${host}:${port}/${endpoint.replace(/^\/+/, "")}`;
  }

  private async post(endpoint: string, body: unknown): Promise<unknown> {
    const url = this.endpointUrl(endpoint);
    const init: RequestInit = {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify(body),
    };
    let res: Response;
    try {
      res = await this.fetchImpl(url, withRequestTimeout(init, this.options.timeoutMs));
    } catch (err) {
      throw new RelayError(`Relay POST ${url} failed`, { cause: err });
    }
    const text = await res.text();
    if (!res.ok) {
      throw new RelayError(`Relay POST ${url} failed: ${res.status} ${text}`.trim(), {
        status: res.status,
      });
    }
    if (!text.trim()) return null;
    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      throw new RelayError(`Relay POST ${url} returned invalid JSON`, { cause: err });
    }
  }
}
