import type { AddressInfo, Socket } from "node:net";

import WebSocket, { WebSocketServer } from "ws";

import { rawDataToString } from "../infra/ws.js";

export type RealtimePeer = {
  socket: WebSocket;
  /** Underlying TCP stream; pausing it stops the server from reading (and answering) frames. */
  stream: Socket;
  /** Next text frame the client sent. */
  next: (timeoutMs?: number) => Promise<string>;
  closed: Promise<{ code: number; reason: string }>;
};

export type FakeRealtimeServer = {
  url: string;
  nextPeer: (timeoutMs?: number) => Promise<RealtimePeer>;
  close: () => Promise<void>;
};

function createPeer(socket: WebSocket, stream: Socket): RealtimePeer {
  const queue: string[] = [];
  let waiter: ((text: string) => void) | null = null;
  socket.on("message", (data) => {
    const text = rawDataToString(data);
    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(text);
      return;
    }
    queue.push(text);
  });
  const closed = new Promise<{ code: number; reason: string }>((resolve) => {
    socket.once("close", (code, reason) => resolve({ code, reason: reason.toString("utf8") }));
  });
  const next = (timeoutMs = 5000) =>
    new Promise<string>((resolve, reject) => {
      const queued = queue.shift();
      if (queued !== undefined) return resolve(queued);
      const timer = setTimeout(() => {
        waiter = null;
        reject(new Error("timeout waiting for client frame"));
      }, timeoutMs);
      waiter = (text) => {
        clearTimeout(timer);
        resolve(text);
      };
    });
  return { socket, stream, next, closed };
}

/** In-process stand-in for the realtime endpoint a device record points at. */
export async function startFakeRealtimeServer(): Promise<FakeRealtimeServer> {
  const wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  await new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", reject);
  });
  const port = (wss.address() as AddressInfo).port;

  const peers: RealtimePeer[] = [];
  let waiter: ((peer: RealtimePeer) => void) | null = null;
  wss.on("connection", (socket, request) => {
    const peer = createPeer(socket, request.socket);
    if (waiter) {
      const resolve = waiter;
      waiter = null;
      resolve(peer);
      return;
    }
    peers.push(peer);
  });

  const nextPeer = (timeoutMs = 5000) =>
    new Promise<RealtimePeer>((resolve, reject) => {
      const queued = peers.shift();
      if (queued) return resolve(queued);
      const timer = setTimeout(() => {
        waiter = null;
        reject(new Error("timeout waiting for client connection"));
      }, timeoutMs);
      waiter = (peer) => {
        clearTimeout(timer);
        resolve(peer);
      };
    });

  const close = async () => {
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return { url: `ws://127.0.0.1:${port}/`, nextPeer, close };
}
