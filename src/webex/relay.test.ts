import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RelayError } from "./errors.js";
import { RelayClient, type RelayServerConfig } from "./relay.js";
import { type FakeRealtimeServer, startFakeRealtimeServer } from "./test-helpers.realtime.js";

const SERVER: RelayServerConfig = {
  host: "relay.example.test",
  port: 8080,
  userId: "user-1",
  groups: ["alerts", "builds"],
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createFetchMock(respond: (url: string, init?: RequestInit) => Response) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    respond(String(input), init),
  );
}

describe("RelayClient", () => {
  it("registers the user's groups and returns the relay url", async () => {
    const fetchMock = createFetchMock(() => jsonResponse({ url: "ws://relay.example.test/ws/abc" }));
    const client = new RelayClient({ server: SERVER, fetchImpl: fetchMock });

    const url = await client.register("/register");

    expect(url).toBe("ws://relay.example.test/ws/abc");
    const [target, init] = fetchMock.mock.calls[0];
    expect(target).toBe("http://relay.example.test:8080/register");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ user_id: "user-1", groups: ["alerts", "builds"] }));
  });

  it("uses https when the server is secure", async () => {
    const fetchMock = createFetchMock(() => jsonResponse({ url: "wss://relay.example.test/ws" }));
    const client = new RelayClient({ server: { ...SERVER, secure: true }, fetchImpl: fetchMock });

    await client.register("register");

    expect(fetchMock.mock.calls[0][0]).toBe("https://relay.example.test:8080/register");
  });

  it("rejects a register response without a url", async () => {
    const fetchMock = createFetchMock(() => jsonResponse({ ok: true }));
    const client = new RelayClient({ server: SERVER, fetchImpl: fetchMock });

    await expect(client.register("register")).rejects.toThrow(
      "Relay register on http://relay.example.test:8080/register returned no url",
    );
  });

  it("publishes a JSON message as a string", async () => {
    const fetchMock = createFetchMock(() => new Response("", { status: 200 }));
    const client = new RelayClient({ server: SERVER, fetchImpl: fetchMock });

    await client.publish("publish", "alerts", { level: "high" });

    const [target, init] = fetchMock.mock.calls[0];
    expect(target).toBe("http://relay.example.test:8080/publish");
    expect(init?.body).toBe(
      JSON.stringify({ user_id: "user-1", group: "alerts", message: '{"level":"high"}' }),
    );
  });

  it("surfaces non-2xx responses with the status", async () => {
    const fetchMock = createFetchMock(() => new Response("nope", { status: 500 }));
    const client = new RelayClient({ server: SERVER, fetchImpl: fetchMock });

    const err = await client.publish("publish", "alerts", "hi").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RelayError);
    expect(err).toMatchObject({
      status: 500,
      message: "Relay POST http://relay.example.test:8080/publish failed: 500 nope",
    });
  });

  describe("relayed stream", () => {
    let server: FakeRealtimeServer;

    beforeEach(async () => {
      server = await startFakeRealtimeServer();
    });

    afterEach(async () => {
      await server.close();
    });

    it("connects without an authorization frame and receives relayed text", async () => {
      const client = new RelayClient({ server: SERVER, closeTimeoutMs: 2_000 });
      const peerPromise = server.nextPeer();
      await client.connect(server.url);
      const peer = await peerPromise;
      expect(client.state).toBe("listening");

      const received: string[] = [];
      const loop = client.listenForMessages((text) => {
        received.push(text);
      });
      peer.socket.send("first");
      peer.socket.close(1000, "done");
      await loop;

      expect(received).toEqual(["first"]);
      expect(client.state).toBe("closed");
    });

    it("sends text over the relayed connection", async () => {
      const client = new RelayClient({ server: SERVER, closeTimeoutMs: 2_000 });
      const peerPromise = server.nextPeer();
      await client.connect(server.url);
      const peer = await peerPromise;

      await client.send("hello relay");

      expect(await peer.next()).toBe("hello relay");
      await client.close();
      expect(client.state).toBe("closed");
    });
  });
});
