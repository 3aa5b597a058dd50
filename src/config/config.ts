import fs from "node:fs";

import JSON5 from "json5";

import { resolveConfigPath } from "./paths.js";
import type { BotConfig, ConfigFileSnapshot, ConfigValidationIssue } from "./types.js";
import { BotSchema } from "./zod-schema.js";

export type * from "./types.js";
export { resolveConfigDir, resolveConfigPath } from "./paths.js";

export function parseConfigJson5(
  raw: string,
): { ok: true; parsed: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, parsed: JSON5.parse(raw) as unknown };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export function validateConfigObject(
  raw: unknown,
): { ok: true; config: BotConfig } | { ok: false; issues: ConfigValidationIssue[] } {
  const validated = BotSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message: iss.message,
      })),
    };
  }
  return { ok: true, config: validated.data };
}

export function readConfigFileSnapshot(configPath: string = resolveConfigPath()): ConfigFileSnapshot {
  if (!fs.existsSync(configPath)) {
    return {
      path: configPath,
      exists: false,
      raw: null,
      parsed: {},
      valid: true,
      config: {},
      issues: [],
    };
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  const parsedRes = parseConfigJson5(raw);
  if (!parsedRes.ok) {
    return {
      path: configPath,
      exists: true,
      raw,
      parsed: {},
      valid: false,
      config: {},
      issues: [{ path: "", message: `JSON5 parse failed: ${parsedRes.error}` }],
    };
  }

  const validated = validateConfigObject(parsedRes.parsed);
  if (!validated.ok) {
    return {
      path: configPath,
      exists: true,
      raw,
      parsed: parsedRes.parsed,
      valid: false,
      config: {},
      issues: validated.issues,
    };
  }

  return {
    path: configPath,
    exists: true,
    raw,
    parsed: parsedRes.parsed,
    valid: true,
    config: validated.config,
    issues: [],
  };
}

export class ConfigError extends Error {
  readonly issues: ConfigValidationIssue[];

  constructor(configPath: string, issues: ConfigValidationIssue[]) {
    const details = issues.map((iss) => `- ${iss.path || "<root>"}: ${iss.message}`).join("\n");
    super(`Invalid config at ${configPath}:\n${details}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Reads and validates the config file. A missing file yields an empty config. */
export function loadConfig(configPath?: string): BotConfig {
  const snapshot = readConfigFileSnapshot(configPath);
  if (!snapshot.valid) {
    throw new ConfigError(snapshot.path, snapshot.issues);
  }
  return snapshot.config;
}

function clean(value?: string): string {
  return value?.trim() ?? "";
}

export function resolveBotToken(
  cfg: BotConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return (
    clean(env.WEBEX_BOT_TOKEN) || clean(env.WEBEX_ACCESS_TOKEN) || clean(cfg.token) || undefined
  );
}
