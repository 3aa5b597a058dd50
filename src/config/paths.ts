import os from "node:os";
import path from "node:path";

export function resolveConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.WEBEX_BOT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(homedir(), ".webex-bot");
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.WEBEX_BOT_CONFIG?.trim();
  if (override) return resolveUserPath(override, homedir);
  return path.join(resolveConfigDir(env, homedir), "config.json5");
}

export function resolveUserPath(input: string, homedir: () => string = os.homedir): string {
  const trimmed = input.trim();
  if (trimmed.startsWith("~")) {
    return path.resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return path.resolve(trimmed);
}
