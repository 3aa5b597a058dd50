import { createWebexBot } from "../bot/bot.js";
import { loadCommandModules } from "../bot/plugins.js";
import { startWebhookServer } from "../bot/webhook-server.js";
import type { BotMode } from "../config/config.js";
import { info, warn } from "../globals.js";
import type { RuntimeEnv } from "../runtime.js";
import type { CliDeps } from "./deps.js";
import { prepareCli } from "./shared.js";

export type RunCommandOpts = {
  config?: string;
  token?: string;
  mode?: string;
  host?: string;
  port?: string;
  path?: string;
  secret?: string;
  commands?: string[];
  /** false for --no-prefer-existing; commander defaults it to true otherwise. */
  preferExisting?: boolean;
  verbose?: boolean;
};

export function parseBotMode(raw: string | undefined): BotMode | undefined {
  const value = raw?.trim().toLowerCase();
  if (!value) return undefined;
  if (value === "websocket" || value === "webhook") return value;
  throw new Error(`Invalid --mode "${raw}" (expected websocket or webhook)`);
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const port = Number.parseInt(raw, 10);
  if (!Number.isFinite(port) || port < 0 || port > 65535 || String(port) !== raw.trim()) {
    throw new Error(`Invalid --port "${raw}"`);
  }
  return port;
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

export async function runCommand(
  opts: RunCommandOpts,
  deps: CliDeps,
  runtime: RuntimeEnv,
  abortSignal: AbortSignal,
): Promise<void> {
  const { cfg, token, client } = prepareCli(opts, deps);
  const mode = parseBotMode(opts.mode) ?? cfg.mode ?? "websocket";
  const port = parsePort(opts.port);

  const bot = createWebexBot({ token, client, config: cfg, runtime });
  const modules = await loadCommandModules(bot, [
    ...(cfg.commands?.modules ?? []),
    ...(opts.commands ?? []),
  ]);
  const registered = bot.commands.list().map((entry) => entry.keyword);
  if (registered.length === 0) {
    runtime.log(warn("No commands registered; every message will be dropped."));
  } else {
    runtime.log(
      info(`Loaded ${modules.length} command module(s): ${registered.join(", ")}`),
    );
  }

  if (mode === "webhook") {
    const server = await startWebhookServer({
      bot,
      host: opts.host ?? cfg.webhook?.host,
      port: port ?? cfg.webhook?.port,
      path: opts.path ?? cfg.webhook?.path,
      secret: opts.secret ?? cfg.webhook?.secret,
    });
    runtime.log(info(`Webhook server listening on port ${server.port}`));
    await waitForAbort(abortSignal);
    await server.close();
  } else {
    await bot.monitorWebsocket({
      abortSignal,
      // Only the negated flag overrides config.
      preferExisting: opts.preferExisting === false ? false : undefined,
    });
  }
  await bot.waitForIdle();
}
