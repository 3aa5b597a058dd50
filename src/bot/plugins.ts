import path from "node:path";
import { pathToFileURL } from "node:url";

import { logVerbose } from "../globals.js";
import type { WebexBot } from "./bot.js";

export type CommandModuleRegister = (bot: WebexBot) => void | Promise<void>;

export type CommandModule = {
  id?: string;
  name?: string;
  description?: string;
  register: CommandModuleRegister;
};

function isCommandModule(value: unknown): value is CommandModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "register" in value &&
    typeof value.register === "function"
  );
}

/** Accepts `export default { register }`, `export default (bot) => …` or `export function register`. */
export function resolveCommandModule(specifier: string, exported: unknown): CommandModule {
  const candidates: unknown[] = [];
  if (typeof exported === "object" && exported !== null) {
    if ("default" in exported) candidates.push(exported.default);
    candidates.push(exported);
  }
  for (const candidate of candidates) {
    if (typeof candidate === "function") {
      const register: CommandModuleRegister = (bot) => candidate(bot);
      return { id: specifier, register };
    }
    if (isCommandModule(candidate)) {
      return { ...candidate, id: candidate.id ?? specifier };
    }
  }
  throw new Error(`Command module "${specifier}" exports no register function`);
}

function toImportSpecifier(specifier: string, cwd: string): string {
  if (specifier.startsWith(".") || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

export async function loadCommandModules(
  bot: WebexBot,
  specifiers: readonly string[],
  opts: { cwd?: string; importModule?: (specifier: string) => Promise<unknown> } = {},
): Promise<CommandModule[]> {
  const cwd = opts.cwd ?? process.cwd();
  const importModule = opts.importModule ?? ((specifier: string) => import(specifier));
  const loaded: CommandModule[] = [];
  for (const specifier of specifiers) {
    const exported: unknown = await importModule(toImportSpecifier(specifier, cwd));
    const mod = resolveCommandModule(specifier, exported);
    await mod.register(bot);
    logVerbose(`commands: loaded module ${mod.id ?? specifier}`);
    loaded.push(mod);
  }
  return loaded;
}
