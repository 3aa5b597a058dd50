import { type BotConfig, resolveBotToken } from "../config/config.js";
import { setVerbose } from "../globals.js";
import { configureLogger } from "../logging.js";
import type { WebexClient } from "../webex/api.js";
import type { CliDeps } from "./deps.js";

export type CliContext = {
  cfg: BotConfig;
  token: string;
  client: WebexClient;
};

/** Loads config, applies logging settings and builds the REST client shared by every command. */
export function prepareCli(
  opts: { config?: string; token?: string; verbose?: boolean },
  deps: CliDeps,
  env: NodeJS.ProcessEnv = process.env,
): CliContext {
  const cfg = deps.loadConfig(opts.config);
  const verbose = Boolean(opts.verbose);
  setVerbose(verbose);
  configureLogger({
    ...cfg.logging,
    ...(verbose && !cfg.logging?.level ? { level: "debug" } : {}),
  });
  const token = opts.token?.trim() || resolveBotToken(cfg, env);
  if (!token) {
    throw new Error(
      "Webex token missing: pass --token, set WEBEX_BOT_TOKEN, or add token to the config file",
    );
  }
  const client = deps.createClient({
    token,
    baseUrl: cfg.api?.baseUrl,
    deviceUrl: cfg.api?.deviceUrl,
  });
  return { cfg, token, client };
}
