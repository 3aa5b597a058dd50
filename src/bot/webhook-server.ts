import http from "node:http";
import type { AddressInfo } from "node:net";

import { info } from "../globals.js";
import { getChildLogger } from "../logging.js";
import type { WebexBot } from "./bot.js";
import { verifyWebexSignature, WEBEX_SIGNATURE_HEADER } from "./webhook-security.js";

export const DEFAULT_WEBHOOK_PATH = "/webhook";
export const DEFAULT_WEBHOOK_HOST = "0.0.0.0";
export const DEFAULT_WEBHOOK_PORT = 8080;
export const DEFAULT_WEBHOOK_MAX_BODY_BYTES = 1_048_576;

export type StartWebhookServerOpts = {
  bot: Pick<WebexBot, "handleWebhookEvent">;
  host?: string;
  /** 0 picks an ephemeral port. */
  port?: number;
  path?: string;
  secret?: string;
  maxBodyBytes?: number;
};

export type WebhookServer = {
  port: number;
  close: () => Promise<void>;
};

/** Resolves null when the body exceeds `maxBytes`; the rest is drained, not buffered. */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    req
      .on("data", (c) => {
        const chunk = Buffer.isBuffer(c) ? c : Buffer.from(c);
        totalBytes += chunk.length;
        if (totalBytes > maxBytes) {
          chunks.length = 0;
          return;
        }
        chunks.push(chunk);
      })
      .on("end", () => resolve(totalBytes > maxBytes ? null : Buffer.concat(chunks)))
      .on("error", reject);
  });
}

function reply(res: http.ServerResponse, status: number, body: string) {
  res.statusCode = status;
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.end(body);
}

export async function startWebhookServer(opts: StartWebhookServerOpts): Promise<WebhookServer> {
  const log = getChildLogger({ module: "webhook-server" });
  const webhookPath = opts.path ?? DEFAULT_WEBHOOK_PATH;
  const host = opts.host ?? DEFAULT_WEBHOOK_HOST;
  const secret = opts.secret?.trim() || undefined;
  const maxBodyBytes = opts.maxBodyBytes ?? DEFAULT_WEBHOOK_MAX_BODY_BYTES;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (req.method === "GET" && url.pathname === "/") {
      reply(res, 200, "WebexBot Server");
      return;
    }
    if (req.method !== "POST" || url.pathname !== webhookPath) {
      reply(res, 404, "Not Found");
      return;
    }

    const rawBody = await readBody(req, maxBodyBytes);
    if (!rawBody) {
      log.warn({ maxBodyBytes }, "webhook body too large");
      reply(res, 413, "Payload Too Large");
      return;
    }
    if (
      secret &&
      !verifyWebexSignature({ secret, rawBody, signature: req.headers[WEBEX_SIGNATURE_HEADER] })
    ) {
      log.warn("webhook signature mismatch");
      reply(res, 401, "Invalid signature");
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString("utf-8"));
    } catch {
      reply(res, 400, "Invalid JSON");
      return;
    }
    const disposition = opts.bot.handleWebhookEvent(payload);
    if (disposition === "invalid") {
      reply(res, 400, "Invalid webhook envelope");
      return;
    }
    reply(res, 200, disposition === "accepted" ? "OK" : "Ignored");
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      log.error({ error: String(err) }, "webhook request failed");
      if (!res.headersSent) reply(res, 500, "Internal Server Error");
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port ?? DEFAULT_WEBHOOK_PORT, host, () => resolve());
  });
  const { port } = server.address() as AddressInfo;
  log.info(info(`webhook server listening on ${host}:${port}${webhookPath}`));

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
