import type { WebexClient } from "../webex/api.js";
import type { WebexMessage } from "../webex/types.js";

export type CommandArgDefinition = {
  name: string;
  required: boolean;
};

/** `[argument name, token value]`, in registration order. */
export type CommandArgBinding = [name: string, value: string];

export type CommandInvocation = {
  client: WebexClient;
  message: WebexMessage;
  command: string;
  required: CommandArgBinding[];
  optional: CommandArgBinding[];
};

export type CommandCallback = (invocation: CommandInvocation) => void | Promise<void>;

export type CommandHandler = {
  handle: CommandCallback;
};

export type CommandTableEntry = {
  keyword: string;
  args: readonly CommandArgDefinition[];
  handler: CommandHandler;
};

export type ParsedCommand = {
  command: string;
  required: CommandArgBinding[];
  optional: CommandArgBinding[];
  handler: CommandHandler;
};

export type CommandParseErrorCode = "no-command" | "unknown-command" | "missing-arguments";

export type CommandParseResult =
  | { ok: true; command: ParsedCommand }
  | { ok: false; error: CommandParseError };

export class CommandParseError extends Error {
  readonly code: CommandParseErrorCode;

  constructor(code: CommandParseErrorCode, message: string) {
    super(message);
    this.name = "CommandParseError";
    this.code = code;
  }
}
