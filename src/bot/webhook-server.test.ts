import { afterEach, describe, expect, it, vi } from "vitest";

import type { WebhookDisposition } from "./bot.js";
import { computeWebexSignature, verifyWebexSignature } from "./webhook-security.js";
import { startWebhookServer, type WebhookServer } from "./webhook-server.js";

let server: WebhookServer | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
});

async function start(
  opts: { secret?: string; disposition?: WebhookDisposition; maxBodyBytes?: number } = {},
) {
  const handleWebhookEvent = vi.fn((_payload: unknown) => opts.disposition ?? "accepted");
  server = await startWebhookServer({
    bot: { handleWebhookEvent },
    host: "127.0.0.1",
    port: 0,
    secret: opts.secret,
    maxBodyBytes: opts.maxBodyBytes,
  });
  return { base: `http://127.0.0.1:${server.port}`, handleWebhookEvent };
}

const envelope = {
  id: "hook-1",
  resource: "messages",
  event: "created",
  data: { id: "m-1" },
};

describe("startWebhookServer", () => {
  it("answers the health check", async () => {
    const { base } = await start();

    const res = await fetch(`${base}/`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("WebexBot Server");
  });

  it("hands webhook envelopes to the bot", async () => {
    const { base, handleWebhookEvent } = await start();

    const res = await fetch(`${base}/webhook`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(envelope),
    });

    expect(res.status).toBe(200);
    expect(handleWebhookEvent).toHaveBeenCalledWith(envelope);
  });

  it("rejects bodies that are not JSON", async () => {
    const { base, handleWebhookEvent } = await start();

    const res = await fetch(`${base}/webhook`, { method: "POST", body: "{oops" });

    expect(res.status).toBe(400);
    expect(handleWebhookEvent).not.toHaveBeenCalled();
  });

  it("rejects envelopes the bot considers invalid", async () => {
    const { base } = await start({ disposition: "invalid" });

    const res = await fetch(`${base}/webhook`, { method: "POST", body: "{}" });

    expect(res.status).toBe(400);
  });

  it("rejects bodies over the size limit with 413", async () => {
    const { base, handleWebhookEvent } = await start({ maxBodyBytes: 64 });

    const res = await fetch(`${base}/webhook`, {
      method: "POST",
      body: JSON.stringify({ ...envelope, padding: "x".repeat(200) }),
    });

    expect(res.status).toBe(413);
    expect(await res.text()).toBe("Payload Too Large");
    expect(handleWebhookEvent).not.toHaveBeenCalled();
  });

  it("accepts bodies at the size limit", async () => {
    const body = JSON.stringify(envelope);
    const { base, handleWebhookEvent } = await start({ maxBodyBytes: Buffer.byteLength(body) });

    const res = await fetch(`${base}/webhook`, { method: "POST", body });

    expect(res.status).toBe(200);
    expect(handleWebhookEvent).toHaveBeenCalledWith(envelope);
  });

  it("returns 404 for other routes", async () => {
    const { base } = await start();

    expect((await fetch(`${base}/elsewhere`)).status).toBe(404);
    expect((await fetch(`${base}/webhook`)).status).toBe(404);
  });

  it("verifies the signature when a secret is configured", async () => {
    const { base, handleWebhookEvent } = await start({ secret: "test-secret" });
    const body = JSON.stringify(envelope);

    const unsigned = await fetch(`${base}/webhook`, { method: "POST", body });
    const forged = await fetch(`${base}/webhook`, {
      method: "POST",
      body,
      headers: { "X-Spark-Signature": computeWebexSignature("wrong-secret", body) },
    });
    const signed = await fetch(`${base}/webhook`, {
      method: "POST",
      body,
      headers: { "X-Spark-Signature": computeWebexSignature("test-secret", body) },
    });

    expect(unsigned.status).toBe(401);
    expect(forged.status).toBe(401);
    expect(signed.status).toBe(200);
    expect(handleWebhookEvent).toHaveBeenCalledTimes(1);
  });
});

describe("verifyWebexSignature", () => {
  it("compares the hex HMAC-SHA1 of the raw body", () => {
    const rawBody = '{"id":"hook-1"}';
    const signature = computeWebexSignature("test-secret", rawBody);

    expect(signature).toMatch(/^[0-9a-f]{40}$/);
    expect(verifyWebexSignature({ secret: "test-secret", rawBody, signature })).toBe(true);
    expect(
      verifyWebexSignature({ secret: "test-secret", rawBody, signature: signature.toUpperCase() }),
    ).toBe(true);
    expect(verifyWebexSignature({ secret: "test-secret", rawBody: `${rawBody} `, signature })).toBe(
      false,
    );
    expect(verifyWebexSignature({ secret: "test-secret", rawBody, signature: undefined })).toBe(
      false,
    );
  });
});
