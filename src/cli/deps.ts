import { loadConfig } from "../config/config.js";
import { createWebexClient } from "../webex/api.js";

export type CliDeps = {
  loadConfig: typeof loadConfig;
  createClient: typeof createWebexClient;
};

export function createDefaultDeps(): CliDeps {
  return { loadConfig, createClient: createWebexClient };
}
