import { logVerbose } from "../globals.js";
import {
  type CommandArgBinding,
  type CommandArgDefinition,
  type CommandCallback,
  type CommandHandler,
  CommandParseError,
  type CommandParseResult,
  type CommandTableEntry,
} from "./commands-registry.types.js";

export * from "./commands-registry.types.js";

export function requiredArg(name: string): CommandArgDefinition {
  return { name, required: true };
}

export function optionalArg(name: string): CommandArgDefinition {
  return { name, required: false };
}

export function toCommandHandler(handler: CommandHandler | CommandCallback): CommandHandler {
  return typeof handler === "function" ? { handle: handler } : handler;
}

export function tokenizeCommandText(raw: string): string[] {
  const trimmed = raw.trim();
  if (!trimmed) return [];
  return trimmed.split(/\s+/);
}

function normalizeKeyword(keyword: string): string {
  const trimmed = keyword.trim();
  if (!trimmed) {
    throw new Error("Command keyword is required");
  }
  if (/\s/.test(trimmed)) {
    throw new Error(`Command keyword must be a single token (got "${trimmed}")`);
  }
  return trimmed;
}

function validateArgs(keyword: string, args: readonly CommandArgDefinition[]) {
  const seen = new Set<string>();
  for (const arg of args) {
    const name = arg.name.trim();
    if (!name) {
      throw new Error(`Command "${keyword}" has an argument without a name`);
    }
    if (seen.has(name)) {
      throw new Error(`Command "${keyword}" declares argument "${name}" twice`);
    }
    seen.add(name);
  }
}

/**
 * Keyword → argument table. Text is expected as `<mention> <keyword> <args...>`;
 * arguments bind positionally to the tokens after the keyword.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, CommandTableEntry>();

  add(
    keyword: string,
    args: readonly CommandArgDefinition[],
    handler: CommandHandler | CommandCallback,
  ): CommandTableEntry {
    const key = normalizeKeyword(keyword);
    validateArgs(key, args);
    const entry: CommandTableEntry = {
      keyword: key,
      args: args.map((arg) => ({ name: arg.name.trim(), required: arg.required })),
      handler: toCommandHandler(handler),
    };
    if (this.commands.has(key)) {
      logVerbose(`commands: replacing handler for "${key}"`);
    }
    this.commands.set(key, entry);
    return entry;
  }

  remove(keyword: string): boolean {
    return this.commands.delete(keyword.trim());
  }

  has(keyword: string): boolean {
    return this.commands.has(keyword.trim());
  }

  list(): CommandTableEntry[] {
    return [...this.commands.values()];
  }

  parse(raw: string): CommandParseResult {
    const tokens = tokenizeCommandText(raw);
    if (tokens.length < 2) {
      return {
        ok: false,
        error: new CommandParseError("no-command", "Command was not specified"),
      };
    }

    const keyword = tokens[1];
    const entry = this.commands.get(keyword);
    if (!entry) {
      return {
        ok: false,
        error: new CommandParseError("unknown-command", `Unknown command "${keyword}"`),
      };
    }

    const supplied = tokens.slice(2);
    if (supplied.length < entry.args.length) {
      const missing = entry.args.slice(supplied.length).map((arg) => arg.name);
      return {
        ok: false,
        error: new CommandParseError(
          "missing-arguments",
          `Command "${keyword}" is missing arguments: ${missing.join(", ")}`,
        ),
      };
    }

    const required: CommandArgBinding[] = [];
    const optional: CommandArgBinding[] = [];
    entry.args.forEach((arg, index) => {
      const binding: CommandArgBinding = [arg.name, supplied[index]];
      if (arg.required) {
        required.push(binding);
      } else {
        optional.push(binding);
      }
    });

    return {
      ok: true,
      command: { command: keyword, required, optional, handler: entry.handler },
    };
  }
}
